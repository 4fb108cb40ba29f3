import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  trace: vi.fn(),
  fatal: vi.fn(),
}));

vi.mock('@hostpulse/shared', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@hostpulse/shared')>();
  return { ...actual, getLogger: () => mockLogger };
});

import { ReadError } from '@hostpulse/shared';
import type { ReaderTag } from '@hostpulse/shared';
import { Sampler } from '../Sampler.js';
import type { ReaderSet } from '../readers/CounterReader.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function healthyReaders(): ReaderSet {
  return {
    cpu: { tag: 'cpu', read: async () => [12.5, 0, 7.25, 100] },
    mem: { tag: 'mem', read: async () => ({ total: 16_360_284_160, used: 10_183_102_464 }) },
    swap: { tag: 'swap', read: async () => ({ total: 17_179_865_088, used: 4_194_304 }) },
    net: { tag: 'net', read: async () => ({ lo: { rx: 4094, tx: 4094 } }) },
    proc: { tag: 'proc', read: async () => ({ total: 280, running: 0, sleeping: 215, zombie: 0 }) },
  };
}

function failing(readers: ReaderSet, tag: ReaderTag, error: unknown): ReaderSet {
  const broken = {
    read: async (): Promise<never> => {
      throw error;
    },
  };
  return { ...readers, [tag]: { ...readers[tag], ...broken } };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Sampler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should assemble a snapshot from every reader', async () => {
    const sampler = new Sampler(healthyReaders());

    await expect(sampler.sample()).resolves.toEqual({
      cpu: [12.5, 0, 7.25, 100],
      mem: { total: 16_360_284_160, used: 10_183_102_464 },
      swap: { total: 17_179_865_088, used: 4_194_304 },
      net: { lo: { rx: 4094, tx: 4094 } },
      proc: { total: 280, running: 0, sleeping: 215, zombie: 0 },
    });
  });

  it('should return a deeply frozen snapshot', async () => {
    const snapshot = await new Sampler(healthyReaders()).sample();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.cpu)).toBe(true);
    expect(Object.isFrozen(snapshot.mem)).toBe(true);
    expect(Object.isFrozen(snapshot.net)).toBe(true);
    expect(Object.isFrozen(snapshot.net.lo)).toBe(true);
    expect(Object.isFrozen(snapshot.proc)).toBe(true);
  });

  it('should not share records with reader output', async () => {
    const net = { eth0: { rx: 1, tx: 2 } };
    const readers = healthyReaders();
    const sampler = new Sampler({ ...readers, net: { tag: 'net', read: async () => net } });

    const snapshot = await sampler.sample();
    net.eth0.rx = 999;

    expect(snapshot.net.eth0).toEqual({ rx: 1, tx: 2 });
  });

  it('should substitute the zero value for a failing reader', async () => {
    const error = new ReadError('net', 'cannot read /proc/net/dev');
    const sampler = new Sampler(failing(healthyReaders(), 'net', error));

    const { snapshot, failures } = await sampler.sampleWithReport();

    expect(snapshot.net).toEqual({});
    expect(snapshot.mem).toEqual({ total: 16_360_284_160, used: 10_183_102_464 });
    expect(failures).toEqual([{ tag: 'net', error }]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      { tag: 'net', err: error },
      'Counter reader failed, reporting zero value',
    );
  });

  it('should wrap errors that are not ReadErrors', async () => {
    const cause = new Error('boom');
    const sampler = new Sampler(failing(healthyReaders(), 'proc', cause));

    const { snapshot, failures } = await sampler.sampleWithReport();

    expect(snapshot.proc).toEqual({ total: 0, running: 0, sleeping: 0, zombie: 0 });
    expect(failures).toHaveLength(1);
    expect(failures[0].error).toBeInstanceOf(ReadError);
    expect(failures[0].error.message).toBe('Failed to read proc: boom');
    expect(failures[0].error.cause).toBe(cause);
  });

  it('should fall back to zero for every family when all readers fail', async () => {
    let readers = healthyReaders();
    for (const tag of ['cpu', 'mem', 'swap', 'net', 'proc'] as const) {
      readers = failing(readers, tag, new Error(`${tag} down`));
    }

    const { snapshot, failures } = await new Sampler(readers).sampleWithReport();

    expect(snapshot).toEqual({
      cpu: [],
      mem: { total: 0, used: 0 },
      swap: { total: 0, used: 0 },
      net: {},
      proc: { total: 0, running: 0, sleeping: 0, zombie: 0 },
    });
    expect(failures.map((f) => f.tag)).toEqual(['cpu', 'mem', 'swap', 'net', 'proc']);
  });

  it('should report each failure to the onReadError hook', async () => {
    const onReadError = vi.fn();
    const error = new ReadError('swap', 'unsupported platform: darwin');
    const sampler = new Sampler(failing(healthyReaders(), 'swap', error), { onReadError });

    await sampler.sample();

    expect(onReadError).toHaveBeenCalledTimes(1);
    expect(onReadError).toHaveBeenCalledWith({ tag: 'swap', error });
  });

  it('should still return a snapshot when the hook throws', async () => {
    const sampler = new Sampler(failing(healthyReaders(), 'cpu', new Error('x')), {
      onReadError: () => {
        throw new Error('hook failed');
      },
    });

    const snapshot = await sampler.sample();

    expect(snapshot.cpu).toEqual([]);
    expect(mockLogger.error).toHaveBeenCalledWith(
      expect.objectContaining({ tag: 'cpu' }),
      'Read error handler threw',
    );
  });

  it('should keep sampling on later calls after a failure', async () => {
    let calls = 0;
    const readers = healthyReaders();
    const flaky: ReaderSet = {
      ...readers,
      mem: {
        tag: 'mem',
        read: async () => {
          calls += 1;
          if (calls === 1) throw new ReadError('mem', 'transient');
          return { total: 100, used: 40 };
        },
      },
    };
    const sampler = new Sampler(flaky);

    expect((await sampler.sample()).mem).toEqual({ total: 0, used: 0 });
    expect((await sampler.sample()).mem).toEqual({ total: 100, used: 40 });
  });
});
