/**
 * Section splitting
 *
 * A section's paragraphs are cut into cores of at most maxChunkSize
 * characters. Cut points prefer paragraph boundaries, then sentence
 * boundaries, then word boundaries; a hard cut is the last resort.
 * Overlap is added after the cores are fixed, so it never changes how many
 * pieces a section yields.
 */

import type { PageSpan } from '../types/index.js'

export interface SectionUnit {
  text: string
  page: number
}

export interface SectionPiece {
  content: string
  pageSpan: PageSpan
  /** 0-based; 0 for the first (or only) piece */
  splitPart: number
  /** Leading characters repeated from the previous piece's core */
  overlapChars: number
}

export interface SplitOptions {
  maxChunkSize: number
  overlap: number
}

const PARAGRAPH_JOINER = '\n\n'
const SENTENCE_BOUNDARY = /(?<=[.!?;])\s+/

interface Atom {
  text: string
  /** Separator placed before the atom when it follows another in a core */
  joiner: string
  page: number
}

interface Core {
  text: string
  pageSpan: PageSpan
}

function hardCut(text: string, max: number): string[] {
  const pieces: string[] = []
  for (let i = 0; i < text.length; i += max) {
    pieces.push(text.slice(i, i + max))
  }
  return pieces
}

function atomize(unit: SectionUnit, max: number): Atom[] {
  const text = unit.text.trim()
  if (!text) return []
  if (text.length <= max) {
    return [{ text, joiner: PARAGRAPH_JOINER, page: unit.page }]
  }

  const atoms: Atom[] = []
  for (const sentence of text.split(SENTENCE_BOUNDARY)) {
    if (sentence.length <= max) {
      atoms.push({ text: sentence, joiner: ' ', page: unit.page })
      continue
    }
    for (const word of sentence.split(/\s+/)) {
      if (word.length <= max) {
        atoms.push({ text: word, joiner: ' ', page: unit.page })
        continue
      }
      hardCut(word, max).forEach((part, i) => {
        atoms.push({ text: part, joiner: i === 0 ? ' ' : '', page: unit.page })
      })
    }
  }
  if (atoms.length > 0) {
    atoms[0] = { ...atoms[0], joiner: PARAGRAPH_JOINER }
  }
  return atoms
}

function packCores(atoms: Atom[], max: number): Core[] {
  const cores: Core[] = []
  let current: Core | null = null

  for (const atom of atoms) {
    if (current && current.text.length + atom.joiner.length + atom.text.length <= max) {
      current.text += atom.joiner + atom.text
      current.pageSpan.end = Math.max(current.pageSpan.end, atom.page)
      continue
    }
    if (current) cores.push(current)
    current = { text: atom.text, pageSpan: { start: atom.page, end: atom.page } }
  }
  if (current) cores.push(current)

  return cores
}

/**
 * Trailing `size` characters of text, moved forward to the next word start
 * when the cut lands inside a word. Falls back to the raw tail when the
 * window holds a single word.
 */
export function overlapTail(text: string, size: number): string {
  if (size <= 0 || text.length === 0) return ''
  if (text.length <= size) return text

  const start = text.length - size
  if (/\s/.test(text[start - 1])) {
    return text.slice(start).trimStart()
  }

  const tail = text.slice(start)
  const nextSpace = tail.search(/\s/)
  if (nextSpace === -1) return tail
  return tail.slice(nextSpace).trimStart()
}

/**
 * Split one section into pieces; an empty list when the section has no text.
 */
export function splitSection(units: SectionUnit[], options: SplitOptions): SectionPiece[] {
  const atoms = units.flatMap((unit) => atomize(unit, options.maxChunkSize))
  const cores = packCores(atoms, options.maxChunkSize)

  return cores.map((core, index) => {
    if (index === 0) {
      return { content: core.text, pageSpan: core.pageSpan, splitPart: 0, overlapChars: 0 }
    }

    const previous = cores[index - 1]
    const tail = overlapTail(previous.text, options.overlap)
    if (!tail) {
      return { content: core.text, pageSpan: core.pageSpan, splitPart: index, overlapChars: 0 }
    }

    return {
      content: `${tail} ${core.text}`,
      pageSpan: {
        start: Math.min(previous.pageSpan.end, core.pageSpan.start),
        end: core.pageSpan.end,
      },
      splitPart: index,
      overlapChars: tail.length,
    }
  })
}
