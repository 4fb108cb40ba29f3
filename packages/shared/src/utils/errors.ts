import type { ReaderTag } from '../types/snapshot.js';

export class HostpulseError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HostpulseError';
    this.code = code;
  }
}

/**
 * A metric family could not be read: the OS interface is missing or returned
 * data that does not parse.
 */
export class ReadError extends HostpulseError {
  public readonly tag: ReaderTag;

  constructor(tag: ReaderTag, message: string, options?: { cause?: unknown }) {
    super(`Failed to read ${tag}: ${message}`, 'READ_ERROR', options);
    this.name = 'ReadError';
    this.tag = tag;
  }
}

/**
 * The collector did not accept a payload. `status` is set when a response
 * arrived with a non-2xx code, and unset for transport failures and timeouts.
 */
export class SendError extends HostpulseError {
  public readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, 'SEND_ERROR', { cause: options.cause });
    this.name = 'SendError';
    this.status = options.status;
  }
}

export class DecodeError extends HostpulseError {
  constructor(message: string) {
    super(`Invalid snapshot payload: ${message}`, 'DECODE_ERROR');
    this.name = 'DecodeError';
  }
}

export class ConfigValidationError extends HostpulseError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
