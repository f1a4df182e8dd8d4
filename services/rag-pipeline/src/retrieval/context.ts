import type { RankedResult } from '../types/index.js'

const SEPARATOR = '\n\n---\n\n'

export function citationLabel(result: RankedResult): string {
  const { start, end } = result.pageSpan
  const pages = start === end ? `p. ${start}` : `pp. ${start}-${end}`
  const path = result.hierarchyPath.length > 0 ? ` > ${result.hierarchyPath.join(' > ')}` : ''
  return `[${result.rank}] ${result.document.filename}${path} (${pages})`
}

/**
 * Citation-headed context block for an answer generator. Results are added
 * in rank order until the next one would exceed maxChars; the first result
 * is truncated rather than dropped.
 */
export function buildContext(results: RankedResult[], maxChars = 8000): string {
  let context = ''

  for (const result of results) {
    const block = `${citationLabel(result)}\n${result.content}`
    const next = context ? `${context}${SEPARATOR}${block}` : block
    if (next.length > maxChars) {
      if (!context) context = block.slice(0, maxChars)
      break
    }
    context = next
  }

  return context
}
