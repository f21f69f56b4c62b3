import { command } from 'cleye'
import { parseFlagIds } from '../flag-ids'
import { loadCatalog, openEditor, reportError, toSlotIndex } from './context'
import { catalogFlags, sharedFlags, slotFlags } from './flags'

export const get = command(
  {
    name: 'get',
    parameters: ['<save>', '<flag ids...>'],
    flags: {
      ...sharedFlags,
      ...slotFlags,
      ...catalogFlags
    },
    help: {
      description: 'Read event flags of a character',
      examples: [
        'slotsmith get ER0000.sl2 71190 9100',
        'slotsmith get -s 2 -c flags.json ER0000.sl2 71190,9100'
      ]
    }
  },
  async (argv) => {
    try {
      const slotIndex = toSlotIndex(argv.flags.slot)
      const catalog = await loadCatalog(argv.flags.catalog)
      const editor = await openEditor(argv._.save, argv.flags)
      const flagIds = parseFlagIds(argv._.flagIds.join(' '))
      const readings = editor.container.slot(slotIndex).readFlags(flagIds)

      for (const reading of readings) {
        if ('error' in reading) {
          console.log(`${reading.flagId}: ERROR - ${reading.error.message}`)
        } else {
          const state = reading.value ? 'ON' : 'OFF'
          console.log(
            `${reading.flagId}: [${state}] ${catalog.name(reading.flagId)}`
          )
        }
      }
    } catch (error) {
      reportError(error)
    }
  }
)
