/**
 * PdfStructurer - pdf text extraction with layout-based heading detection
 *
 * Uses unpdf (pdf.js) to pull per-page text, then classifies each line:
 * - structural keywords (Part, Title, Chapter, Article, Section) become
 *   headings ranked by keyword
 * - numbered outlines ("2.", "3.1", "4.1.2 ...") become headings ranked by depth
 * - short ALL-CAPS lines become top-level headings
 * Everything else is paragraph text; blank lines end a paragraph.
 */

import { extractText, getDocumentProxy } from 'unpdf'
import { InputError, errorMessage } from '../errors.js'
import type { DocumentIdentity } from '../types/index.js'
import type {
  DocumentStructurer,
  StructuredBlock,
  StructuredDocument,
} from './structurer.js'

const PDF_MAGIC = '%PDF-'

/** Heading lines are short; longer lines are body text even if they match */
const MAX_HEADING_LENGTH = 120

const KEYWORD_LEVELS: Record<string, number> = {
  part: 1,
  title: 2,
  chapter: 3,
  article: 4,
  section: 5,
}

const KEYWORD_HEADING =
  /^(part|title|chapter|article|section)\s+([0-9]+[a-z]?|[ivxlcdm]+)\b[.:\-–\s]*/i
const NUMBERED_HEADING = /^(\d+(?:\.\d+)*)[.)]?\s+(\p{Lu}.*)$/u
/** Numbered outline levels sit below every keyword level */
const NUMBERED_BASE_LEVEL = 5

export interface HeadingMatch {
  level: number
  text: string
}

/**
 * Classify one line of page text as a heading, or return null for body text.
 */
export function detectHeading(rawLine: string): HeadingMatch | null {
  const line = rawLine.trim().replace(/\s+/g, ' ')
  if (!line || line.length > MAX_HEADING_LENGTH) return null

  const keyword = KEYWORD_HEADING.exec(line)
  // "Section 5 of this Act applies ...", wrapped body text, ends mid-sentence
  const looksLikeSentence = /[,;]$/.test(line) || (line.endsWith('.') && line.length > 60)
  if (keyword && !looksLikeSentence) {
    return { level: KEYWORD_LEVELS[keyword[1].toLowerCase()], text: line }
  }

  const numbered = NUMBERED_HEADING.exec(line)
  // A sentence that happens to start with a number ends with a period
  if (numbered && !/[.;:,]$/.test(line) && numbered[2].split(' ').length <= 12) {
    const depth = numbered[1].split('.').length
    return { level: NUMBERED_BASE_LEVEL + depth, text: line }
  }

  const letters = line.replace(/[^\p{L}]/gu, '')
  if (letters.length >= 3 && letters === letters.toUpperCase() && letters !== letters.toLowerCase()) {
    return { level: 1, text: line }
  }

  return null
}

/**
 * Turn per-page text into an ordered block list.
 */
export function blocksFromPages(pages: string[]): StructuredBlock[] {
  const blocks: StructuredBlock[] = []

  pages.forEach((pageText, pageIndex) => {
    const page = pageIndex + 1
    let paragraph: string[] = []

    const flush = () => {
      const text = paragraph.join(' ').trim()
      if (text) {
        blocks.push({ type: 'text', text, page })
      }
      paragraph = []
    }

    for (const rawLine of pageText.split(/\r?\n/)) {
      const line = rawLine.trim()
      if (!line) {
        flush()
        continue
      }

      const heading = detectHeading(line)
      if (heading) {
        flush()
        blocks.push({ type: 'heading', level: heading.level, text: heading.text, page })
        continue
      }

      paragraph.push(line)
    }
    flush()
  })

  return blocks
}

export function isPdf(bytes: Uint8Array): boolean {
  if (bytes.length < PDF_MAGIC.length) return false
  // The header may be preceded by a few bytes of garbage
  const head = new TextDecoder('latin1').decode(bytes.subarray(0, 1024))
  return head.includes(PDF_MAGIC)
}

export class PdfStructurer implements DocumentStructurer {
  async structure(
    bytes: Uint8Array,
    identity: DocumentIdentity
  ): Promise<StructuredDocument> {
    if (!isPdf(bytes)) {
      throw new InputError(`${identity.filename} is not a PDF document`)
    }

    let pages: string[]
    let totalPages: number
    try {
      // pdf.js may detach the buffer it is given, so hand it a copy
      const pdf = await getDocumentProxy(new Uint8Array(bytes))
      try {
        const result = await extractText(pdf, { mergePages: false })
        pages = Array.isArray(result.text) ? result.text : [result.text]
        totalPages = result.totalPages
      } finally {
        await pdf.destroy()
      }
    } catch (error) {
      throw new InputError(
        `Failed to parse ${identity.filename}: ${errorMessage(error)}`,
        { cause: error }
      )
    }

    return { pageCount: totalPages, blocks: blocksFromPages(pages) }
  }
}
