import { freemem, totalmem } from 'node:os';
import type { MemoryStats } from '@hostpulse/shared';
import { ReadError } from '@hostpulse/shared';
import type { CounterReader } from './CounterReader.js';
import { parseMeminfo, readProcText, toCount, type ProcfsOptions } from './procfs.js';

export interface MemoryReaderOptions extends ProcfsOptions {
  memory?: () => { total: number; free: number };
}

/**
 * Physical memory. On Linux `used` is MemTotal - MemAvailable, so page cache
 * and reclaimable buffers do not count as used. Elsewhere it falls back to
 * the runtime's total and free figures.
 */
export class MemoryReader implements CounterReader<'mem'> {
  readonly tag = 'mem';
  private procRoot: string;
  private platform: NodeJS.Platform;
  private memory: () => { total: number; free: number };

  constructor(options: MemoryReaderOptions) {
    this.procRoot = options.procRoot;
    this.platform = options.platform ?? process.platform;
    this.memory = options.memory ?? (() => ({ total: totalmem(), free: freemem() }));
  }

  async read(): Promise<MemoryStats> {
    if (this.platform !== 'linux') {
      const { total, free } = this.memory();
      return { total: toCount(total), used: toCount(total - free) };
    }

    const fields = parseMeminfo(await readProcText('mem', this.procRoot, 'meminfo'));
    const total = fields.get('MemTotal');
    if (total === undefined) {
      throw new ReadError('mem', 'MemTotal missing from meminfo');
    }

    const available =
      fields.get('MemAvailable') ??
      (fields.get('MemFree') ?? 0) + (fields.get('Buffers') ?? 0) + (fields.get('Cached') ?? 0);

    return { total: toCount(total), used: toCount(total - available) };
  }
}
