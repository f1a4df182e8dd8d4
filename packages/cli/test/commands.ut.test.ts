/**
 * CLI command helpers Unit Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { InvalidArgumentError } from 'commander';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InputError } from '@legal-rag/pipeline';
import { collectSources } from '../src/commands/ingest.js';
import { loadCliConfig, parsePositiveInt, parseThreshold } from '../src/utils/services.js';

describe('collectSources', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'legal-rag-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should put arguments before manifest entries', async () => {
    const manifest = path.join(dir, 'manifest.json');
    await writeFile(manifest, JSON.stringify({ documents: [{ url: 'https://courts.test/r/1.pdf' }] }));

    const sources = await collectSources(['https://courts.test/r/0.pdf', path.join(dir, 'local.pdf')], {
      manifest,
    });

    expect(sources).toEqual([
      { locator: 'https://courts.test/r/0.pdf' },
      { locator: path.join(dir, 'local.pdf') },
      { locator: 'https://courts.test/r/1.pdf' },
    ]);
  });

  it('should read every PDF of a directory', async () => {
    await writeFile(path.join(dir, 'code.pdf'), '%PDF-1.7');

    await expect(collectSources([], { dir })).resolves.toEqual([
      { locator: path.join(dir, 'code.pdf'), filename: 'code.pdf' },
    ]);
  });

  it('should refuse to run without sources', async () => {
    await expect(collectSources([], {})).rejects.toThrow(InputError);
  });
});

describe('loadCliConfig', () => {
  it('should let flags override the environment', () => {
    const config = loadCliConfig(
      { concurrency: 7, skipUnchanged: true },
      { RAG_INGEST_CONCURRENCY: '2', RAG_SKIP_UNCHANGED: 'false' }
    );

    expect(config.ingestion.concurrency).toBe(7);
    expect(config.ingestion.skipUnchanged).toBe(true);
  });

  it('should keep environment values when no flag is given', () => {
    const config = loadCliConfig({}, { RAG_INGEST_CONCURRENCY: '2' });

    expect(config.ingestion.concurrency).toBe(2);
    expect(config.ingestion.skipUnchanged).toBe(false);
  });
});

describe('option parsers', () => {
  it('should accept positive integers only', () => {
    expect(parsePositiveInt('12')).toBe(12);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow(InvalidArgumentError);
  });

  it('should accept thresholds between -1 and 1', () => {
    expect(parseThreshold('0.75')).toBe(0.75);
    expect(() => parseThreshold('1.2')).toThrow(InvalidArgumentError);
  });
});
