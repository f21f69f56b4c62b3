import { command } from 'cleye'
import { openEditor, reportError } from './context'
import { sharedFlags } from './flags'

export const validate = command(
  {
    name: 'validate',
    parameters: ['<save>'],
    flags: {
      ...sharedFlags
    },
    help: {
      description: 'Check every stored checksum against the file contents',
      examples: ['slotsmith validate ER0000.sl2']
    }
  },
  async (argv) => {
    try {
      const editor = await openEditor(argv._.save, argv.flags)
      const result = editor.container.validate()

      for (const region of result.regions) {
        const name =
          region.kind === 'slot' ? `slot ${region.index + 1}` : 'profile'
        console.log(`${name}: ${region.matches ? 'OK' : 'MISMATCH'}`)
        if (!region.matches) {
          console.log(`  stored:   ${region.stored}`)
          console.log(`  computed: ${region.computed}`)
        }
      }

      if (result.valid) {
        console.log(`All ${result.regions.length} checksums match`)
      } else {
        console.log(
          `${result.mismatches.length} of ${result.regions.length} checksums do not match`
        )
        process.exitCode = 1
      }
    } catch (error) {
      reportError(error)
    }
  }
)
