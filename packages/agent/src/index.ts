export { Agent, createAgent } from './Agent.js';
export type { AgentOptions } from './Agent.js';
export { Sampler } from './Sampler.js';
export type { SamplerOptions } from './Sampler.js';
export { Reporter } from './Reporter.js';
export type { ReporterOptions } from './Reporter.js';
export { encode, decode } from './encoder.js';
export { createSnapshot } from './snapshot.js';

export {
  createDefaultReaders,
  CpuReader,
  MemoryReader,
  SwapReader,
  NetworkReader,
  ProcessReader,
  parseNetDev,
  parseProcessState,
  parseMeminfo,
  toCount,
} from './readers/index.js';

export type {
  CounterReader,
  ReaderSet,
  DefaultReaderOptions,
  CpuReaderOptions,
  MemoryReaderOptions,
  ProcfsOptions,
} from './readers/index.js';

export type {
  ReaderFailure,
  SampleReport,
  SendAck,
  SnapshotSource,
  PayloadSender,
  AgentStats,
  AgentEvent,
} from './types.js';
