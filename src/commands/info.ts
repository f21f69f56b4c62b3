import { command } from 'cleye'
import { openEditor, reportError } from './context'
import { sharedFlags } from './flags'

export const info = command(
  {
    name: 'info',
    parameters: ['<save>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Show the character slots of a save file',
      examples: [
        'slotsmith info ER0000.sl2',
        'slotsmith info -p ./profile.json ER0000.sl2'
      ]
    }
  },
  async (argv) => {
    try {
      const editor = await openEditor(argv._.save, argv.flags)
      const container = editor.container
      const checks = container.validate().regions

      console.log(`Profile: ${container.profile.name}`)
      console.log(`Entries: ${container.getEntryCount()}`)
      console.log()

      for (const slot of container.slots()) {
        const check = checks.find(
          (region) => region.kind === 'slot' && region.index === slot.index
        )
        const state = slot.isEmpty()
          ? 'empty'
          : `occupied (version ${slot.version})`
        const digest = check?.matches ? 'checksum ok' : 'checksum MISMATCH'
        console.log(`Slot ${slot.index + 1}: ${state}, ${digest}`)
      }
    } catch (error) {
      reportError(error)
    }
  }
)
