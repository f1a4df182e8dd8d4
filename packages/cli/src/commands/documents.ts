import chalk from 'chalk'
import { Command } from 'commander'
import { EXIT_FAILURE, EXIT_SUCCESS, formatReembedResult } from '../utils/output.js'
import { parsePositiveInt, runAction, withServices } from '../utils/services.js'

export const deleteCommand = new Command('delete')
  .description('Delete a document and all of its chunks')
  .argument('<documentId>', 'numeric document id', parsePositiveInt)
  .action(
    runAction(async (documentId: number) => {
      const deleted = await withServices({}, ({ store }) => store.deleteDocument(documentId))
      if (!deleted) {
        console.log(chalk.yellow(`Document ${documentId} not found`))
        return EXIT_FAILURE
      }
      console.log(`${chalk.green('✓')} Deleted document ${documentId}`)
      return EXIT_SUCCESS
    })
  )

interface ReembedCommandOptions {
  document?: number
  limit?: number
}

export const reembedCommand = new Command('reembed')
  .description('Embed chunks left pending or failed by earlier runs')
  .option('--document <id>', 'only chunks of this document', parsePositiveInt)
  .option('--limit <n>', 'maximum number of chunks to embed', parsePositiveInt)
  .action(
    runAction(async (options: ReembedCommandOptions) => {
      const result = await withServices({}, ({ pipeline }) =>
        pipeline.reembedPending({ documentId: options.document, limit: options.limit })
      )
      console.log(formatReembedResult(result))
      return result.failed > 0 ? EXIT_FAILURE : EXIT_SUCCESS
    })
  )
