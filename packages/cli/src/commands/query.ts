import { Command } from 'commander'
import { buildContext } from '@legal-rag/pipeline'
import { exitCodeForResponse, formatRetrieval } from '../utils/output.js'
import { parsePositiveInt, parseThreshold, runAction, withServices } from '../utils/services.js'

interface QueryCommandOptions {
  k?: number
  threshold?: number
  json?: boolean
  context?: boolean
}

export const queryCommand = new Command('query')
  .description('Retrieve the passages most similar to a question')
  .argument('<text>', 'question or search text')
  .option('-k, --k <n>', 'maximum number of passages', parsePositiveInt)
  .option('-t, --threshold <x>', 'minimum cosine similarity (-1 to 1)', parseThreshold)
  .option('--context', 'print the citation-headed context block for an answer generator')
  .option('--json', 'print the response as JSON')
  .action(
    runAction(async (text: string, options: QueryCommandOptions) => {
      const response = await withServices({}, ({ retrieval }) =>
        retrieval.retrieve(text, { k: options.k, similarityThreshold: options.threshold })
      )

      if (options.json) {
        console.log(JSON.stringify(response, null, 2))
      } else if (options.context && response.status === 'ok') {
        console.log(buildContext(response.results))
      } else {
        console.log(formatRetrieval(response))
      }
      return exitCodeForResponse(response)
    })
  )
