export interface MemoryStats {
  total: number;
  used: number;
}

export interface NetworkStats {
  rx: number;
  tx: number;
}

export interface ProcessStats {
  total: number;
  running: number;
  sleeping: number;
  zombie: number;
}

/**
 * One point-in-time sample of the host. Created fresh every cycle and never
 * merged with an earlier one.
 */
export interface Snapshot {
  cpu: readonly number[];
  mem: MemoryStats;
  swap: MemoryStats;
  net: Readonly<Record<string, NetworkStats>>;
  proc: ProcessStats;
}

/**
 * Maps each metric family to the Snapshot field its reader produces.
 */
export interface ReaderValueMap {
  cpu: readonly number[];
  mem: MemoryStats;
  swap: MemoryStats;
  net: Readonly<Record<string, NetworkStats>>;
  proc: ProcessStats;
}

export type ReaderTag = keyof ReaderValueMap;

export const READER_TAGS: readonly ReaderTag[] = ['cpu', 'mem', 'swap', 'net', 'proc'];
