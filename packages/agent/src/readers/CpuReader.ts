import { cpus, type CpuInfo } from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import { ReadError } from '@hostpulse/shared';
import type { CounterReader } from './CounterReader.js';

export interface CpuReaderOptions {
  /** Milliseconds between the two counter reads. */
  window: number;
  cpus?: () => CpuInfo[];
  sleep?: (ms: number) => Promise<unknown>;
}

interface CoreTimes {
  idle: number;
  total: number;
}

function coreTimes(cpu: CpuInfo): CoreTimes {
  const { user, nice, sys, idle, irq } = cpu.times;
  return { idle, total: user + nice + sys + idle + irq };
}

/**
 * Per-core utilization over a short window: busy ticks over total ticks
 * between two reads of the kernel's cumulative CPU times.
 */
export class CpuReader implements CounterReader<'cpu'> {
  readonly tag = 'cpu';
  private window: number;
  private readCpus: () => CpuInfo[];
  private wait: (ms: number) => Promise<unknown>;

  constructor(options: CpuReaderOptions) {
    this.window = options.window;
    this.readCpus = options.cpus ?? cpus;
    this.wait = options.sleep ?? sleep;
  }

  async read(): Promise<number[]> {
    const before = this.readCpus().map(coreTimes);
    if (before.length === 0) {
      throw new ReadError('cpu', 'no logical cores reported');
    }

    await this.wait(this.window);

    const after = this.readCpus().map(coreTimes);
    if (after.length !== before.length) {
      throw new ReadError(
        'cpu',
        `core count changed during sampling (${before.length} -> ${after.length})`,
      );
    }

    return after.map((current, i) => {
      const last = before[i];
      const totalDiff = current.total - last.total;
      const idleDiff = current.idle - last.idle;
      if (totalDiff <= 0) return 0;

      const percent = Math.min(100, Math.max(0, ((totalDiff - idleDiff) / totalDiff) * 100));
      return Math.round(percent * 100) / 100;
    });
  }
}
