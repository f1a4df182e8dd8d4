/**
 * Source loading Unit Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { InputError, ServiceUnavailableError } from '../../src/errors.js';
import { DefaultSourceLoader, filenameFor, isUrl } from '../../src/sources/source-loader.js';

const PDF_TEXT = '%PDF-1.7 downloaded';

function createLoader(responses: (() => Response)[], cacheDir?: string) {
  let call = 0;
  const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => {
    const respond = responses[Math.min(call, responses.length - 1)];
    call++;
    return respond();
  });
  const loader = new DefaultSourceLoader({
    downloadTimeoutMs: 1000,
    downloadMaxAttempts: 3,
    retryBaseDelayMs: 0,
    cacheDir,
    fetch: fetchMock,
  });
  return { loader, fetchMock };
}

const ok = () => new Response(PDF_TEXT, { status: 200 });

describe('isUrl', () => {
  it('should match http and https locators only', () => {
    expect(isUrl('https://courts.test/a.pdf')).toBe(true);
    expect(isUrl('HTTP://courts.test/a.pdf')).toBe(true);
    expect(isUrl('/docs/a.pdf')).toBe(false);
    expect(isUrl('ftp://courts.test/a.pdf')).toBe(false);
  });
});

describe('filenameFor', () => {
  it('should prefer an explicit filename', () => {
    expect(filenameFor({ locator: '/docs/a.pdf', filename: 'Contract.pdf' })).toBe('Contract.pdf');
  });

  it('should decode the last URL segment', () => {
    expect(filenameFor({ locator: 'https://courts.test/files/Lease%20A.pdf?v=2' })).toBe('Lease A.pdf');
  });

  it('should fall back to the host name for a bare URL', () => {
    expect(filenameFor({ locator: 'https://courts.test/' })).toBe('courts.test.pdf');
  });

  it('should use the base name of a path', () => {
    expect(filenameFor({ locator: '/docs/civil/code.pdf' })).toBe('code.pdf');
  });

  it('should reject a malformed URL', () => {
    expect(() => filenameFor({ locator: 'https://' })).toThrow(InputError);
  });
});

describe('DefaultSourceLoader', () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = await mkdtemp(path.join(os.tmpdir(), 'legal-rag-loader-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read a local file', async () => {
    const file = path.join(dir, 'lease.pdf');
    await writeFile(file, '%PDF-1.7 local');
    const { loader, fetchMock } = createLoader([ok]);

    const loaded = await loader.load({ locator: file });

    expect(new TextDecoder().decode(loaded.bytes)).toBe('%PDF-1.7 local');
    expect(loaded.filename).toBe('lease.pdf');
    expect(loaded.sizeBytes).toBe(14);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should report a missing local file as an input error', async () => {
    const file = path.join(dir, 'absent.pdf');
    const { loader } = createLoader([ok]);

    await expect(loader.load({ locator: file })).rejects.toThrow(
      new InputError(`File not found: ${file}`)
    );
  });

  it('should download a URL', async () => {
    const { loader, fetchMock } = createLoader([ok]);

    const loaded = await loader.load({ locator: 'https://courts.test/rulings/123.pdf' });

    expect(new TextDecoder().decode(loaded.bytes)).toBe(PDF_TEXT);
    expect(loaded.filename).toBe('123.pdf');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('https://courts.test/rulings/123.pdf');
  });

  it('should retry a download that fails with a server error', async () => {
    const { loader, fetchMock } = createLoader([
      () => new Response('unavailable', { status: 503, statusText: 'Service Unavailable' }),
      ok,
    ]);

    const loaded = await loader.load({ locator: 'https://courts.test/rulings/123.pdf' });

    expect(loaded.sizeBytes).toBe(PDF_TEXT.length);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('should not retry a missing remote document', async () => {
    const { loader, fetchMock } = createLoader([
      () => new Response('missing', { status: 404, statusText: 'Not Found' }),
    ]);

    await expect(loader.load({ locator: 'https://courts.test/rulings/404.pdf' })).rejects.toThrow(
      new InputError('Download of https://courts.test/rulings/404.pdf failed: 404 Not Found')
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should give up after the last attempt', async () => {
    const { loader, fetchMock } = createLoader([
      () => {
        throw new TypeError('fetch failed');
      },
    ]);

    await expect(loader.load({ locator: 'https://courts.test/rulings/123.pdf' })).rejects.toBeInstanceOf(
      ServiceUnavailableError
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should reuse a cached download', async () => {
    const cacheDir = path.join(dir, 'cache');
    const { loader, fetchMock } = createLoader([ok], cacheDir);

    await loader.load({ locator: 'https://courts.test/rulings/123.pdf' });
    const again = await loader.load({ locator: 'https://courts.test/rulings/123.pdf' });

    expect(new TextDecoder().decode(again.bytes)).toBe(PDF_TEXT);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should keep separate cache entries for URLs with the same file name', async () => {
    const cacheDir = path.join(dir, 'cache');
    const { loader, fetchMock } = createLoader(
      [
        () => new Response('%PDF-1.7 first', { status: 200 }),
        () => new Response('%PDF-1.7 second', { status: 200 }),
      ],
      cacheDir
    );

    await loader.load({ locator: 'https://courts.test/a/download.pdf' });
    const second = await loader.load({ locator: 'https://courts.test/b/download.pdf' });
    const firstAgain = await loader.load({ locator: 'https://courts.test/a/download.pdf' });

    expect(new TextDecoder().decode(second.bytes)).toBe('%PDF-1.7 second');
    expect(new TextDecoder().decode(firstAgain.bytes)).toBe('%PDF-1.7 first');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
