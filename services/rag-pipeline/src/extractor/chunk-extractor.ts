/**
 * ChunkExtractor - raw document bytes to ordered, hierarchy-annotated chunks
 *
 * The structurer turns bytes into a flat block list. Headings maintain a
 * stack: a heading of level L closes every open heading of level >= L, and
 * the remaining stack titles form the path of the text that follows.
 * Each section's text goes through splitSection; positions are assigned
 * sequentially afterwards.
 */

import type { ChunkingConfig } from '../config.js'
import { InputError, errorKindOf, errorMessage } from '../errors.js'
import type {
  DocumentIdentity,
  ExtractedChunk,
  ExtractionResult,
} from '../types/index.js'
import { withRetry, withTimeout } from '../utils/retry.js'
import type { DocumentStructurer, StructuredBlock } from './structurer.js'
import { splitSection, type SectionUnit } from './text-splitter.js'

const CITATION_MARKERS = ['Art.', '§', 'Inciso']

export function countCitations(text: string): number {
  return CITATION_MARKERS.reduce((count, marker) => count + text.split(marker).length - 1, 0)
}

export function countWords(text: string): number {
  const trimmed = text.trim()
  return trimmed ? trimmed.split(/\s+/).length : 0
}

interface Section {
  path: string[]
  units: SectionUnit[]
}

/**
 * Group blocks into sections, one per heading (plus a leading section for
 * text before the first heading).
 */
export function sectionsFromBlocks(blocks: StructuredBlock[]): Section[] {
  const stack: { level: number; text: string }[] = []
  const sections: Section[] = []
  let current: Section = { path: [], units: [] }

  for (const block of blocks) {
    if (block.type === 'heading') {
      sections.push(current)
      while (stack.length > 0 && stack[stack.length - 1].level >= block.level) {
        stack.pop()
      }
      stack.push({ level: block.level, text: block.text.trim() })
      current = { path: stack.map((entry) => entry.text), units: [] }
      continue
    }
    current.units.push({ text: block.text, page: block.page })
  }
  sections.push(current)

  return sections
}

/**
 * Deterministic chunking of a structured block list.
 */
export function chunkBlocks(blocks: StructuredBlock[], config: ChunkingConfig): ExtractedChunk[] {
  const chunks: ExtractedChunk[] = []

  sectionsFromBlocks(blocks).forEach((section, sectionIndex) => {
    const pieces = splitSection(section.units, {
      maxChunkSize: config.maxChunkSize,
      overlap: config.overlap,
    })

    for (const piece of pieces) {
      if (!piece.content.trim()) continue
      chunks.push({
        position: chunks.length,
        content: piece.content,
        hierarchyPath: [...section.path],
        pageSpan: piece.pageSpan,
        metadata: {
          wordCount: countWords(piece.content),
          charCount: piece.content.length,
          citationCount: countCitations(piece.content),
          sectionIndex,
          splitPart: piece.splitPart,
          overlapChars: piece.overlapChars,
        },
      })
    }
  })

  return chunks
}

export class ChunkExtractor {
  constructor(
    private readonly structurer: DocumentStructurer,
    private readonly config: ChunkingConfig
  ) {}

  /**
   * Never throws: structurer failures, timeouts and empty documents come back
   * as a failed result with zero chunks.
   */
  async extract(bytes: Uint8Array, identity: DocumentIdentity): Promise<ExtractionResult> {
    const fail = (error: unknown): ExtractionResult => {
      const message = errorMessage(error)
      console.warn(`[ChunkExtractor] ${identity.filename}: ${message}`)
      return {
        status: 'failed',
        identity,
        chunks: [],
        errorKind: errorKindOf(error),
        error: message,
      }
    }

    if (bytes.length === 0) {
      return fail(new InputError(`${identity.filename} is empty`))
    }

    try {
      const structured = await withRetry(
        () =>
          withTimeout(
            (signal) => this.structurer.structure(bytes, identity, signal),
            this.config.structuringTimeoutMs,
            `Structuring ${identity.filename}`
          ),
        {
          maxAttempts: this.config.structuringMaxAttempts,
          baseDelayMs: this.config.retryBaseDelayMs,
          label: `Structuring ${identity.filename}`,
        }
      )

      const chunks = chunkBlocks(structured.blocks, this.config)
      if (chunks.length === 0) {
        return fail(new InputError(`${identity.filename} has no extractable text`))
      }

      console.log(
        `[ChunkExtractor] ${identity.filename}: ${chunks.length} chunks from ${structured.pageCount} pages`
      )
      return { status: 'success', identity, chunks, pageCount: structured.pageCount }
    } catch (error) {
      return fail(error)
    }
  }
}
