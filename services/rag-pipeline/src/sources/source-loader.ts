/**
 * Source loading - local files or URL downloads
 *
 * Downloads get their own timeout and retry budget. When a cache directory is
 * configured, a downloaded file is written there and later runs read it
 * instead of downloading again. Cache entries are keyed by a hash of the URL,
 * since different URLs often end in the same segment.
 */

import { createHash } from 'node:crypto'
import { mkdir, readFile, stat, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { InputError, ServiceUnavailableError, errorMessage } from '../errors.js'
import type { DocumentSource } from '../types/index.js'
import { withRetry, withTimeout } from '../utils/retry.js'

export interface LoadedSource {
  bytes: Uint8Array
  filename: string
  sizeBytes: number
}

export interface SourceLoader {
  /**
   * @throws InputError for a missing file or a rejected URL
   * @throws ServiceUnavailableError when a download keeps failing
   */
  load(source: DocumentSource, signal?: AbortSignal): Promise<LoadedSource>
}

export interface SourceLoaderOptions {
  downloadTimeoutMs: number
  downloadMaxAttempts: number
  retryBaseDelayMs: number
  /** Directory for downloaded files; unset disables caching */
  cacheDir?: string
  fetch?: typeof fetch
}

export function isUrl(locator: string): boolean {
  return /^https?:\/\//i.test(locator)
}

/**
 * Filename for a source: the explicit one, else the last path segment of the
 * URL or file path.
 */
export function filenameFor(source: DocumentSource): string {
  if (source.filename) return source.filename

  if (isUrl(source.locator)) {
    let url: URL
    try {
      url = new URL(source.locator)
    } catch (error) {
      throw new InputError(`Invalid URL: ${source.locator}`, { cause: error })
    }
    const { pathname, hostname } = url
    const last = decodeURIComponent(pathname.split('/').filter(Boolean).pop() ?? '')
    return last || `${hostname}.pdf`
  }
  return path.basename(source.locator)
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class DefaultSourceLoader implements SourceLoader {
  private readonly fetchImpl: typeof fetch

  constructor(private readonly options: SourceLoaderOptions) {
    this.fetchImpl = options.fetch ?? fetch
  }

  async load(source: DocumentSource, signal?: AbortSignal): Promise<LoadedSource> {
    const filename = filenameFor(source)

    if (!isUrl(source.locator)) {
      const bytes = await this.readLocal(source.locator)
      return { bytes, filename, sizeBytes: bytes.length }
    }

    const cached = await this.readCached(source.locator, filename)
    if (cached) {
      console.log(`[SourceLoader] Using cached ${filename}`)
      return { bytes: cached, filename, sizeBytes: cached.length }
    }

    const bytes = await this.download(source.locator, signal)
    await this.writeCached(source.locator, filename, bytes)
    return { bytes, filename, sizeBytes: bytes.length }
  }

  private async readLocal(filePath: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await readFile(filePath))
    } catch (error) {
      if (isNotFound(error)) {
        throw new InputError(`File not found: ${filePath}`, { cause: error })
      }
      throw new InputError(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error })
    }
  }

  private cachePath(url: string, filename: string): string | null {
    if (!this.options.cacheDir) return null
    const key = createHash('sha256').update(url).digest('hex').slice(0, 16)
    return path.join(this.options.cacheDir, `${key}-${path.basename(filename)}`)
  }

  private async readCached(url: string, filename: string): Promise<Uint8Array | null> {
    const cachePath = this.cachePath(url, filename)
    if (!cachePath) return null
    try {
      const info = await stat(cachePath)
      return info.isFile() && info.size > 0 ? new Uint8Array(await readFile(cachePath)) : null
    } catch (error) {
      if (isNotFound(error)) return null
      throw error
    }
  }

  private async writeCached(url: string, filename: string, bytes: Uint8Array): Promise<void> {
    const cachePath = this.cachePath(url, filename)
    if (!cachePath) return
    await mkdir(path.dirname(cachePath), { recursive: true })
    await writeFile(cachePath, bytes)
  }

  private async download(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    return withRetry(
      (attempt) => {
        console.log(
          `[SourceLoader] Downloading ${url} (attempt ${attempt}/${this.options.downloadMaxAttempts})`
        )
        return withTimeout(
          (timeoutSignal) =>
            this.fetchBytes(url, signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal),
          this.options.downloadTimeoutMs,
          `Download of ${url}`
        )
      },
      {
        maxAttempts: this.options.downloadMaxAttempts,
        baseDelayMs: this.options.retryBaseDelayMs,
        label: `Download of ${url}`,
      }
    )
  }

  private async fetchBytes(url: string, signal: AbortSignal): Promise<Uint8Array> {
    let response: Response
    try {
      response = await this.fetchImpl(url, { signal })
    } catch (error) {
      throw new ServiceUnavailableError(`Download of ${url} failed: ${errorMessage(error)}`, {
        cause: error,
      })
    }

    if (!response.ok) {
      const message = `Download of ${url} failed: ${response.status} ${response.statusText}`
      if (response.status === 408 || response.status === 429 || response.status >= 500) {
        throw new ServiceUnavailableError(message)
      }
      throw new InputError(message)
    }

    return new Uint8Array(await response.arrayBuffer())
  }
}
