/**
 * Document-structuring capability
 *
 * The extractor only sees a flat, ordered list of blocks. Any provider that
 * can turn bytes into headings and text with page numbers can be plugged in.
 */

import type { DocumentIdentity } from '../types/index.js'

export interface HeadingBlock {
  type: 'heading'
  /** Smaller is higher in the hierarchy; only the relative order matters */
  level: number
  text: string
  page: number
}

export interface TextBlock {
  type: 'text'
  text: string
  page: number
}

export type StructuredBlock = HeadingBlock | TextBlock

export interface StructuredDocument {
  pageCount: number
  blocks: StructuredBlock[]
}

export interface DocumentStructurer {
  /**
   * @throws InputError when the bytes are not a parseable document
   * @throws ServiceUnavailableError when a remote structuring service is unreachable
   */
  structure(
    bytes: Uint8Array,
    identity: DocumentIdentity,
    signal?: AbortSignal
  ): Promise<StructuredDocument>
}
