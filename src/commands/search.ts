import { command } from 'cleye'
import { loadCatalog, reportError } from './context'
import { catalogFlags } from './flags'

export const search = command(
  {
    name: 'search',
    parameters: ['<term>'],
    flags: {
      ...catalogFlags,
      limit: {
        type: Number,
        alias: 'l',
        description: 'Maximum number of results',
        default: 100
      }
    },
    help: {
      description: 'Search the flag catalog by ID or name',
      examples: ['slotsmith search -c flags.json "church of elleh"']
    }
  },
  async (argv) => {
    try {
      const catalog = await loadCatalog(argv.flags.catalog)
      const { flagIds, total } = catalog.search(argv._.term, argv.flags.limit)

      if (total === 0) {
        console.log('No matching flags')
        return
      }

      for (const flagId of flagIds) {
        console.log(`${flagId}: ${catalog.name(flagId)}`)
      }
      console.log(
        total > flagIds.length
          ? `Found ${total} matching flags (showing ${flagIds.length})`
          : `Found ${total} matching flags`
      )
    } catch (error) {
      reportError(error)
    }
  }
)
