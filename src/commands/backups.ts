import { command } from 'cleye'
import { BackupManager } from '../backup'
import { reportError } from './context'

export const backups = command(
  {
    name: 'backups',
    parameters: ['<save>'],
    flags: {
      backupDir: {
        type: String,
        alias: 'b',
        description: 'Directory for backups (default: <save>.backups)'
      }
    },
    help: {
      description: 'List the backups of a save file, newest first',
      examples: ['slotsmith backups ER0000.sl2']
    }
  },
  async (argv) => {
    try {
      const manager = new BackupManager({ backupDir: argv.flags.backupDir })
      const list = await manager.listBackups(argv._.save)

      if (list.length === 0) {
        console.log('No backups found')
        return
      }

      for (const backup of list) {
        console.log(`${backup.id}  ${backup.operation}`)
        console.log(`  created: ${backup.timestamp}`)
        console.log(`  description: ${backup.description}`)
        console.log(`  size: ${backup.size} bytes`)
      }
      console.log(`Total: ${list.length} backup(s)`)
    } catch (error) {
      reportError(error)
    }
  }
)
