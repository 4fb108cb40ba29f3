export type {
  Snapshot,
  MemoryStats,
  NetworkStats,
  ProcessStats,
  ReaderValueMap,
  ReaderTag,
} from './snapshot.js';
export { READER_TAGS } from './snapshot.js';

export type { AgentConfig, ResolvedAgentConfig } from './config.js';
