import { CpuReader } from './CpuReader.js';
import { MemoryReader } from './MemoryReader.js';
import { NetworkReader } from './NetworkReader.js';
import { ProcessReader } from './ProcessReader.js';
import { SwapReader } from './SwapReader.js';
import type { ReaderSet } from './CounterReader.js';

export interface DefaultReaderOptions {
  procRoot: string;
  cpuSampleWindow: number;
  platform?: NodeJS.Platform;
}

export function createDefaultReaders(options: DefaultReaderOptions): ReaderSet {
  const { procRoot, platform } = options;
  return {
    cpu: new CpuReader({ window: options.cpuSampleWindow }),
    mem: new MemoryReader({ procRoot, platform }),
    swap: new SwapReader({ procRoot, platform }),
    net: new NetworkReader({ procRoot, platform }),
    proc: new ProcessReader({ procRoot, platform }),
  };
}

export type { CounterReader, ReaderSet } from './CounterReader.js';
export { CpuReader } from './CpuReader.js';
export type { CpuReaderOptions } from './CpuReader.js';
export { MemoryReader } from './MemoryReader.js';
export type { MemoryReaderOptions } from './MemoryReader.js';
export { SwapReader } from './SwapReader.js';
export { NetworkReader, parseNetDev } from './NetworkReader.js';
export { ProcessReader, parseProcessState } from './ProcessReader.js';
export { toCount, parseMeminfo } from './procfs.js';
export type { ProcfsOptions } from './procfs.js';
