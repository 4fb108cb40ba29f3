import type { ReaderTag, ReaderValueMap } from '@hostpulse/shared';

/**
 * Reads one metric family from the host. `read()` rejects with a ReadError
 * when the OS interface is missing or returns data that does not parse.
 */
export interface CounterReader<K extends ReaderTag> {
  readonly tag: K;
  read(): Promise<ReaderValueMap[K]>;
}

export type ReaderSet = { [K in ReaderTag]: CounterReader<K> };
