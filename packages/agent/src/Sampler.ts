import type { ReaderTag, ReaderValueMap, Snapshot } from '@hostpulse/shared';
import { ReadError, errorMessage, getLogger } from '@hostpulse/shared';
import type { ReaderSet } from './readers/CounterReader.js';
import { createSnapshot } from './snapshot.js';
import type { ReaderFailure, SampleReport, SnapshotSource } from './types.js';

export interface SamplerOptions {
  onReadError?: (failure: ReaderFailure) => void;
}

// Fallbacks for a family whose reader failed. Zero rather than the previous
// cycle's value, so a broken reader never reports stale numbers.
const ZERO_VALUES: { [K in ReaderTag]: () => ReaderValueMap[K] } = {
  cpu: () => [],
  mem: () => ({ total: 0, used: 0 }),
  swap: () => ({ total: 0, used: 0 }),
  net: () => ({}),
  proc: () => ({ total: 0, running: 0, sleeping: 0, zombie: 0 }),
};

function toReadError(tag: ReaderTag, err: unknown): ReadError {
  return err instanceof ReadError ? err : new ReadError(tag, errorMessage(err), { cause: err });
}

/**
 * Runs every counter reader once and assembles a Snapshot. A failing reader
 * is replaced by its zero value; sampling itself never fails.
 */
export class Sampler implements SnapshotSource {
  private readers: ReaderSet;
  private onReadError?: (failure: ReaderFailure) => void;

  constructor(readers: ReaderSet, options: SamplerOptions = {}) {
    this.readers = readers;
    this.onReadError = options.onReadError;
  }

  async sample(): Promise<Snapshot> {
    const { snapshot } = await this.sampleWithReport();
    return snapshot;
  }

  async sampleWithReport(): Promise<SampleReport> {
    const failures: ReaderFailure[] = [];

    const [cpu, mem, swap, net, proc] = await Promise.all([
      this.readOrZero('cpu', failures),
      this.readOrZero('mem', failures),
      this.readOrZero('swap', failures),
      this.readOrZero('net', failures),
      this.readOrZero('proc', failures),
    ]);

    return { snapshot: createSnapshot({ cpu, mem, swap, net, proc }), failures };
  }

  private async readOrZero<K extends ReaderTag>(
    tag: K,
    failures: ReaderFailure[],
  ): Promise<ReaderValueMap[K]> {
    try {
      return await this.readers[tag].read();
    } catch (err) {
      const failure: ReaderFailure = { tag, error: toReadError(tag, err) };
      failures.push(failure);
      getLogger().warn({ tag, err: failure.error }, 'Counter reader failed, reporting zero value');
      this.notify(failure);
      return ZERO_VALUES[tag]();
    }
  }

  private notify(failure: ReaderFailure): void {
    if (!this.onReadError) return;
    try {
      this.onReadError(failure);
    } catch (err) {
      getLogger().error({ err, tag: failure.tag }, 'Read error handler threw');
    }
  }
}
