import { command } from 'cleye'
import { createEditor, reportError } from './context'
import { sharedFlags } from './flags'

export const restore = command(
  {
    name: 'restore',
    parameters: ['<save>', '<backup id>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Replace a save file with one of its backups',
      examples: ['slotsmith restore ER0000.sl2 20261019-101500-042']
    }
  },
  async (argv) => {
    try {
      // The current file may be too damaged to load
      const editor = await createEditor(argv._.save, argv.flags)
      const { restored, safetyBackup } = await editor.restore(argv._.backupId)

      console.log(`Restored backup ${restored.id} (${restored.operation})`)
      console.log(`Previous file saved as backup ${safetyBackup.id}`)
    } catch (error) {
      reportError(error)
    }
  }
)
