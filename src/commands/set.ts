import { command } from 'cleye'
import { parseFlagIds } from '../flag-ids'
import { openEditor, reportError, toSlotIndex } from './context'
import { sharedFlags, slotFlags } from './flags'

export const set = command(
  {
    name: 'set',
    parameters: ['<save>', '<flag ids...>'],
    flags: {
      ...sharedFlags,
      ...slotFlags,
      off: {
        type: Boolean,
        description: 'Turn the flags off instead of on',
        default: false
      }
    },
    help: {
      description: 'Turn event flags on or off, backing up the save first',
      examples: [
        'slotsmith set ER0000.sl2 71190',
        'slotsmith set --off -s 3 ER0000.sl2 71190 9100'
      ]
    }
  },
  async (argv) => {
    try {
      const slotIndex = toSlotIndex(argv.flags.slot)
      const flagIds = parseFlagIds(argv._.flagIds.join(' '))
      if (flagIds.length === 0) {
        console.error('No valid flag IDs found')
        process.exitCode = 1
        return
      }

      const editor = await openEditor(argv._.save, argv.flags)
      const value = !argv.flags.off

      const result = await editor.setFlags(slotIndex, flagIds, value)

      console.log(
        `Set ${result.applied}/${result.requested} flags to ${value ? 'ON' : 'OFF'} in slot ${slotIndex + 1}`
      )
      console.log(`Backup: ${result.backupId}`)
      if (result.failed.length > 0) {
        process.exitCode = 1
      }
    } catch (error) {
      reportError(error)
    }
  }
)
