import { z } from 'zod';
import {
  DEFAULT_CPU_SAMPLE_WINDOW,
  DEFAULT_ENDPOINT,
  DEFAULT_INTERVAL,
  DEFAULT_PROC_ROOT,
  DEFAULT_SEND_TIMEOUT,
  MAX_TIMER_DELAY,
} from '../constants.js';
import type { ResolvedAgentConfig } from '../types/config.js';
import { ConfigValidationError, errorMessage } from '../utils/errors.js';
import { LOG_LEVELS } from '../utils/logger.js';
import { parseDuration } from '../utils/parser.js';

const duration = z.union([z.string().min(1), z.number().int().positive()]);

export const agentConfigSchema = z.object({
  endpoint: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: 'Endpoint must be http or https' })
    .default(DEFAULT_ENDPOINT),
  interval: duration.default(DEFAULT_INTERVAL),
  cpuSampleWindow: duration.default(DEFAULT_CPU_SAMPLE_WINDOW),
  timeout: duration.default(DEFAULT_SEND_TIMEOUT),
  token: z.string().min(1).optional(),
  headers: z.record(z.string()).optional(),
  display: z.boolean().default(true),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  procRoot: z.string().min(1).default(DEFAULT_PROC_ROOT),
});

export type ValidatedAgentConfig = z.infer<typeof agentConfigSchema>;

/**
 * Validate raw configuration and convert every duration to milliseconds.
 * Every problem found is reported at once in a ConfigValidationError.
 */
export function resolveAgentConfig(input: unknown): ResolvedAgentConfig {
  const result = agentConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const config = result.data;
  const errors: string[] = [];

  const toMs = (key: 'interval' | 'cpuSampleWindow' | 'timeout'): number => {
    try {
      const value = parseDuration(config[key]);
      if (!Number.isFinite(value) || value <= 0) {
        errors.push(`${key}: Duration must be greater than zero`);
        return 0;
      }
      if (value > MAX_TIMER_DELAY) {
        errors.push(`${key}: Duration must not exceed ${MAX_TIMER_DELAY}ms`);
        return 0;
      }
      return value;
    } catch (err) {
      errors.push(`${key}: ${errorMessage(err)}`);
      return 0;
    }
  };

  const interval = toMs('interval');
  const cpuSampleWindow = toMs('cpuSampleWindow');
  const timeout = toMs('timeout');

  if (interval > 0 && cpuSampleWindow > 0 && cpuSampleWindow >= interval) {
    errors.push('cpuSampleWindow: Must be shorter than the reporting interval');
  }

  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }

  return {
    endpoint: config.endpoint,
    interval,
    cpuSampleWindow,
    timeout,
    token: config.token,
    headers: config.headers ?? {},
    display: config.display,
    logLevel: config.logLevel,
    procRoot: config.procRoot,
  };
}
