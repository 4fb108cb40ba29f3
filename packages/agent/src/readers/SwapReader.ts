import type { MemoryStats } from '@hostpulse/shared';
import { ReadError } from '@hostpulse/shared';
import type { CounterReader } from './CounterReader.js';
import { assertLinux, parseMeminfo, readProcText, toCount, type ProcfsOptions } from './procfs.js';

export class SwapReader implements CounterReader<'swap'> {
  readonly tag = 'swap';
  private procRoot: string;
  private platform: NodeJS.Platform;

  constructor(options: ProcfsOptions) {
    this.procRoot = options.procRoot;
    this.platform = options.platform ?? process.platform;
  }

  async read(): Promise<MemoryStats> {
    assertLinux(this.tag, this.platform);

    const fields = parseMeminfo(await readProcText('swap', this.procRoot, 'meminfo'));
    const total = fields.get('SwapTotal');
    const free = fields.get('SwapFree');
    if (total === undefined || free === undefined) {
      throw new ReadError('swap', 'SwapTotal or SwapFree missing from meminfo');
    }

    return { total: toCount(total), used: toCount(total - free) };
  }
}
