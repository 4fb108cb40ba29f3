import type { LogLevel } from '../utils/logger.js';

export interface AgentConfig {
  endpoint: string;
  interval: string | number;
  cpuSampleWindow: string | number;
  timeout: string | number;
  token?: string;
  headers?: Record<string, string>;
  display: boolean;
  logLevel: LogLevel;
  procRoot: string;
}

/**
 * Agent configuration after validation, with every duration in milliseconds.
 */
export interface ResolvedAgentConfig {
  endpoint: string;
  interval: number;
  cpuSampleWindow: number;
  timeout: number;
  token?: string;
  headers: Record<string, string>;
  display: boolean;
  logLevel: LogLevel;
  procRoot: string;
}
