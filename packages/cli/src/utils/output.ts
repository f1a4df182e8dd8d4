import chalk from 'chalk'
import {
  ConfigurationError,
  citationLabel,
  type DocumentReport,
  type DocumentStatus,
  type IngestionReport,
  type ReembedResult,
  type RetrievalResponse,
} from '@legal-rag/pipeline'

export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1
export const EXIT_CONFIGURATION = 2

/** Characters of chunk text shown per query result */
const PREVIEW_LENGTH = 400

const STATUS_STYLE: Record<DocumentStatus, { icon: string; color: (text: string) => string }> = {
  succeeded: { icon: '✓', color: chalk.green },
  partial: { icon: '!', color: chalk.yellow },
  skipped: { icon: '-', color: chalk.gray },
  failed: { icon: '✗', color: chalk.red },
}

export function exitCodeForError(error: unknown): number {
  return error instanceof ConfigurationError ? EXIT_CONFIGURATION : EXIT_FAILURE
}

export function exitCodeForReport(report: IngestionReport): number {
  return report.failed > 0 ? EXIT_FAILURE : EXIT_SUCCESS
}

export function exitCodeForResponse(response: RetrievalResponse): number {
  if (response.status !== 'error') return EXIT_SUCCESS
  return response.error.kind === 'configuration' ? EXIT_CONFIGURATION : EXIT_FAILURE
}

export function preview(text: string, max = PREVIEW_LENGTH): string {
  const flat = text.replace(/\s+/g, ' ').trim()
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat
}

export function formatDocumentReport(document: DocumentReport): string {
  const { icon, color } = STATUS_STYLE[document.status]
  let line = `${color(icon)} ${document.filename} ${color(`[${document.status}]`)}`
  if (document.status === 'succeeded' || document.status === 'partial') {
    line +=
      ` ${document.chunkCount} chunks, ${document.embeddedCount} embedded` +
      `, version ${document.version}`
  }

  const errors = document.errors.map((error) => chalk.gray(`    ${error.kind}: ${error.message}`))
  return [line, ...errors].join('\n')
}

export function formatIngestionReport(report: IngestionReport): string {
  const summary =
    `${report.total} document(s): ${chalk.green(`${report.succeeded} succeeded`)}, ` +
    `${chalk.yellow(`${report.partial} partial`)}, ${report.skipped} skipped, ` +
    `${chalk.red(`${report.failed} failed`)} in ${report.duration_ms}ms`

  return [...report.documents.map(formatDocumentReport), '', summary].join('\n')
}

export function formatRetrieval(response: RetrievalResponse): string {
  if (response.status === 'error') {
    return chalk.red(`Query failed (${response.error.kind}): ${response.error.message}`)
  }
  if (response.status === 'no_results') {
    return chalk.yellow(`No passages above the similarity threshold for "${response.query}"`)
  }

  return response.results
    .map(
      (result) =>
        `${chalk.bold(citationLabel(result))} ${chalk.gray(`similarity ${result.similarity.toFixed(3)}`)}\n` +
        `  ${preview(result.content)}`
    )
    .join('\n\n')
}

export function formatReembedResult(result: ReembedResult): string {
  if (result.attempted === 0) {
    return chalk.gray('No chunks need embedding')
  }
  const failed = result.failed > 0 ? chalk.red(`, ${result.failed} still failing`) : ''
  return `${chalk.green('✓')} Embedded ${result.embedded} of ${result.attempted} chunk(s)${failed}`
}
