import path from 'node:path'
import { Command } from 'commander'
import {
  InputError,
  isUrl,
  loadManifest,
  sourcesFromDirectory,
  type DocumentSource,
} from '@legal-rag/pipeline'
import { exitCodeForReport, formatIngestionReport } from '../utils/output.js'
import { parsePositiveInt, runAction, withServices } from '../utils/services.js'

export interface IngestCommandOptions {
  manifest?: string
  dir?: string
  maxDocuments?: number
  concurrency?: number
  skipUnchanged?: boolean
  downloadDir?: string
  dryRun?: boolean
  json?: boolean
}

/**
 * Sources from positional arguments, then the manifest, then the directory
 */
export async function collectSources(
  args: string[],
  options: Pick<IngestCommandOptions, 'manifest' | 'dir'>
): Promise<DocumentSource[]> {
  const sources: DocumentSource[] = args.map((arg) => ({
    locator: isUrl(arg) ? arg : path.resolve(arg),
  }))
  if (options.manifest) {
    sources.push(...(await loadManifest(options.manifest)))
  }
  if (options.dir) {
    sources.push(...(await sourcesFromDirectory(options.dir)))
  }

  if (sources.length === 0) {
    throw new InputError('No sources given: pass files or URLs, --manifest or --dir')
  }
  return sources
}

export const ingestCommand = new Command('ingest')
  .description('Extract, embed and store PDF documents')
  .argument('[sources...]', 'PDF file paths or URLs')
  .option('-m, --manifest <file>', 'JSON manifest of sources')
  .option('-d, --dir <folder>', 'ingest every PDF in a directory')
  .option('--max-documents <n>', 'only process the first n sources', parsePositiveInt)
  .option('-c, --concurrency <n>', 'documents processed in parallel', parsePositiveInt)
  .option('--skip-unchanged', 'skip documents whose content has not changed')
  .option('--download-dir <folder>', 'cache downloaded files in this directory')
  .option('--dry-run', 'keep chunks in memory; nothing is written to the database')
  .option('--json', 'print the report as JSON')
  .addHelpText(
    'after',
    `
Examples:
  $ legal-rag ingest ./codes/civil-code.pdf https://example.org/rulings/123.pdf
  $ legal-rag ingest --manifest sources.json --concurrency 5
  $ legal-rag ingest --dir ./contracts --skip-unchanged
  `
  )
  .action(
    runAction(async (args: string[], options: IngestCommandOptions) => {
      const sources = await collectSources(args, options)

      const report = await withServices(options, ({ pipeline }) =>
        pipeline.ingest(sources, { maxDocuments: options.maxDocuments })
      )

      console.log(options.json ? JSON.stringify(report, null, 2) : formatIngestionReport(report))
      return exitCodeForReport(report)
    })
  )
