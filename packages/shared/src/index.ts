// Types
export type {
  Snapshot,
  MemoryStats,
  NetworkStats,
  ProcessStats,
  ReaderValueMap,
  ReaderTag,
  AgentConfig,
  ResolvedAgentConfig,
} from './types/index.js';

export { READER_TAGS } from './types/index.js';

// Constants
export {
  HOSTPULSE_VERSION,
  HOSTPULSE_CONFIG_FILE,
  DEFAULT_ENDPOINT,
  DEFAULT_INTERVAL,
  DEFAULT_CPU_SAMPLE_WINDOW,
  DEFAULT_SEND_TIMEOUT,
  DEFAULT_PROC_ROOT,
  MAX_TIMER_DELAY,
  ENV_ENDPOINT,
  ENV_TOKEN,
} from './constants.js';

// Schemas
export {
  snapshotSchema,
  memoryStatsSchema,
  networkStatsSchema,
  processStatsSchema,
} from './schemas/snapshot.schema.js';
export type { ValidatedSnapshot } from './schemas/snapshot.schema.js';

export { agentConfigSchema, resolveAgentConfig } from './schemas/config.schema.js';
export type { ValidatedAgentConfig } from './schemas/config.schema.js';

// Utilities
export {
  parseDuration,
  formatDuration,
  formatBytes,
  formatPercent,
  percentOf,
} from './utils/parser.js';

export { createLogger, getLogger, setDefaultLogger, LOG_LEVELS } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  HostpulseError,
  ReadError,
  SendError,
  DecodeError,
  ConfigValidationError,
  errorMessage,
} from './utils/errors.js';
