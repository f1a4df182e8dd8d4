/**
 * Batch inputs: a JSON manifest of sources, or a directory of PDF files
 *
 * Manifest format, either a bare array or `{ "documents": [...] }`:
 *   [{ "url": "https://...", "filename": "a.pdf", "metadata": { "case": "123" } },
 *    { "path": "./local/b.pdf" }]
 * `locator`, `url` and `path` are interchangeable; relative paths resolve
 * against the manifest's directory.
 */

import { readFile, readdir } from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import { InputError, errorMessage } from '../errors.js'
import type { DocumentSource } from '../types/index.js'
import { isUrl } from './source-loader.js'

const ManifestEntrySchema = z
  .object({
    locator: z.string().min(1).optional(),
    url: z.string().url().optional(),
    path: z.string().min(1).optional(),
    filename: z.string().min(1).optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .transform((entry, ctx) => {
    const locator = entry.locator ?? entry.url ?? entry.path
    if (!locator) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'one of locator, url or path is required',
      })
      return z.NEVER
    }
    return { locator, filename: entry.filename, metadata: entry.metadata }
  })

const ManifestSchema = z.union([
  z.array(ManifestEntrySchema),
  z.object({ documents: z.array(ManifestEntrySchema) }).transform((m) => m.documents),
])

/**
 * Validate parsed manifest JSON.
 *
 * @throws InputError listing every invalid entry
 */
export function parseManifest(data: unknown, baseDir = process.cwd()): DocumentSource[] {
  const parsed = ManifestSchema.safeParse(data)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new InputError(`Invalid manifest: ${details}`)
  }

  return parsed.data.map((entry) => {
    const source: DocumentSource = {
      locator: isUrl(entry.locator) ? entry.locator : path.resolve(baseDir, entry.locator),
    }
    if (entry.filename) source.filename = entry.filename
    if (entry.metadata) source.metadata = entry.metadata
    return source
  })
}

export async function loadManifest(file: string): Promise<DocumentSource[]> {
  let raw: string
  try {
    raw = await readFile(file, 'utf-8')
  } catch (error) {
    throw new InputError(`Cannot read manifest ${file}: ${errorMessage(error)}`, { cause: error })
  }

  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (error) {
    throw new InputError(`Manifest ${file} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    })
  }

  return parseManifest(data, path.dirname(path.resolve(file)))
}

/**
 * Every .pdf file directly inside dir, sorted by name
 */
export async function sourcesFromDirectory(dir: string): Promise<DocumentSource[]> {
  let entries: string[]
  try {
    entries = await readdir(dir)
  } catch (error) {
    throw new InputError(`Cannot read directory ${dir}: ${errorMessage(error)}`, { cause: error })
  }

  return entries
    .filter((name) => name.toLowerCase().endsWith('.pdf'))
    .sort()
    .map((name) => ({ locator: path.resolve(dir, name), filename: name }))
}
