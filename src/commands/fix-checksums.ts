import { command } from 'cleye'
import { openEditor, reportError } from './context'
import { sharedFlags } from './flags'

export const fixChecksums = command(
  {
    name: 'fix-checksums',
    parameters: ['<save>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Recalculate every checksum, backing up the save first',
      examples: ['slotsmith fix-checksums ER0000.sl2']
    }
  },
  async (argv) => {
    try {
      const editor = await openEditor(argv._.save, argv.flags)
      const backup = await editor.fixChecksums()

      console.log(
        `Recalculated ${editor.container.protectedRegions().length} checksums`
      )
      console.log(`Backup: ${backup.id}`)
    } catch (error) {
      reportError(error)
    }
  }
)
