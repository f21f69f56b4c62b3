import { command } from 'cleye'
import { loadCatalog, openEditor, reportError, toSlotIndex } from './context'
import { catalogFlags, sharedFlags, slotFlags } from './flags'

export const unlock = command(
  {
    name: 'unlock',
    parameters: ['<save>', '<category>', '[subcategory]'],
    flags: {
      ...sharedFlags,
      ...slotFlags,
      ...catalogFlags
    },
    help: {
      description: 'Turn on every flag of a catalog category',
      examples: ['slotsmith unlock -c flags.json ER0000.sl2 "Graces" "Limgrave"']
    }
  },
  async (argv) => {
    try {
      const slotIndex = toSlotIndex(argv.flags.slot)
      const catalog = await loadCatalog(argv.flags.catalog)
      const editor = await openEditor(argv._.save, argv.flags)
      const { category, subcategory } = argv._

      const result = await editor.unlockCategory(
        slotIndex,
        catalog,
        category,
        subcategory
      )

      const label = subcategory ? `${category} > ${subcategory}` : category
      if (result.backupId === null) {
        console.log(`All ${result.requested} flags in ${label} are already ON`)
      } else {
        console.log(
          `Turned on ${result.applied} of ${result.requested} flags in ${label}`
        )
        console.log(`Backup: ${result.backupId}`)
      }
    } catch (error) {
      reportError(error)
    }
  }
)
