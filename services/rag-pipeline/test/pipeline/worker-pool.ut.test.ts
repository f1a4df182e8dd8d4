/**
 * WorkerPool Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigurationError, ServiceUnavailableError } from '../../src/errors.js';
import { WorkerPool } from '../../src/pipeline/worker-pool.js';
import { sleep } from '../../src/utils/retry.js';

type Outcome = { item: number; ok: boolean; error?: unknown };

const failure = (item: number, _index: number, error: unknown): Outcome => ({ item, ok: false, error });

describe('WorkerPool', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('should create the configured number of workers', () => {
    const pool = new WorkerPool({ concurrency: 4 });

    expect(pool.getWorkerStats()).toEqual({ busy: 0, idle: 4, total: 4 });
  });

  it('should use at least one worker', () => {
    expect(new WorkerPool({ concurrency: 0 }).getWorkerStats().total).toBe(1);
  });

  it('should return results in input order', async () => {
    const pool = new WorkerPool({ concurrency: 3 });

    const results = await pool.executeAll([30, 10, 20], {
      run: async (item) => {
        await sleep(item);
        return { item, ok: true };
      },
      onFailure: failure,
    });

    expect(results.map((r) => r.item)).toEqual([30, 10, 20]);
  });

  it('should never run more tasks than workers', async () => {
    const pool = new WorkerPool({ concurrency: 2 });
    let active = 0;
    let peak = 0;

    await pool.executeAll([1, 2, 3, 4, 5, 6], {
      run: async (item) => {
        active++;
        peak = Math.max(peak, active);
        await sleep(5);
        active--;
        return { item, ok: true };
      },
      onFailure: failure,
    });

    expect(peak).toBe(2);
  });

  it('should turn a failed task into a failure result', async () => {
    const pool = new WorkerPool({ concurrency: 2 });

    const results = await pool.executeAll<number, Outcome>([1, 2, 3], {
      run: async (item) => {
        if (item === 2) throw new Error('corrupt file');
        return { item, ok: true };
      },
      onFailure: failure,
    });

    expect(results.map((r) => r.ok)).toEqual([true, false, true]);
    expect(results[1].error).toEqual(new Error('corrupt file'));
  });

  it('should stop claiming items after a fatal error', async () => {
    const pool = new WorkerPool({ concurrency: 1 });
    const started: number[] = [];

    const promise = pool.executeAll([1, 2, 3], {
      run: async (item) => {
        started.push(item);
        if (item === 2) throw new ConfigurationError('dimension mismatch');
        return { item, ok: true };
      },
      onFailure: failure,
      isFatal: (error) => error instanceof ConfigurationError,
    });

    await expect(promise).rejects.toThrow('dimension mismatch');
    expect(started).toEqual([1, 2]);
  });

  it('should time out a task and abort its signal', async () => {
    const pool = new WorkerPool({ concurrency: 1, taskTimeoutMinutes: 0.0005 });
    const signals: AbortSignal[] = [];

    const [result] = await pool.executeAll([1], {
      run: (_item, _index, taskSignal) => {
        signals.push(taskSignal);
        return new Promise<Outcome>(() => {});
      },
      onFailure: failure,
    });

    expect(result.ok).toBe(false);
    expect(result.error).toBeInstanceOf(ServiceUnavailableError);
    expect(String(result.error)).toMatch(/Task execution timeout/);
    expect(signals[0].aborted).toBe(true);
  });

  it('should handle an empty item list', async () => {
    const pool = new WorkerPool();

    await expect(pool.executeAll([], { run: async () => 1, onFailure: () => 0 })).resolves.toEqual([]);
  });
});
