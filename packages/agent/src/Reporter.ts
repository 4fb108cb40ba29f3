import { SendError, errorMessage, getLogger } from '@hostpulse/shared';
import type { PayloadSender, SendAck } from './types.js';

export interface ReporterOptions {
  endpoint: string;
  /** Milliseconds before an in-flight request is aborted. */
  timeout: number;
  token?: string;
  headers?: Record<string, string>;
}

const MAX_ERROR_BODY = 200;

/**
 * Posts encoded snapshots to the collector. Every call is independent: no
 * retries, no queue. Anything but a 2xx response is a SendError.
 */
export class Reporter implements PayloadSender {
  private endpoint: string;
  private timeout: number;
  private headers: Record<string, string>;

  constructor(options: ReporterOptions) {
    this.endpoint = options.endpoint;
    this.timeout = options.timeout;
    this.headers = {
      ...options.headers,
      'Content-Type': 'application/json',
    };
    if (options.token) {
      this.headers.Authorization = `Bearer ${options.token}`;
    }
  }

  /**
   * The timeout covers the whole exchange, reading or discarding the response
   * body included.
   */
  async send(payload: Uint8Array): Promise<SendAck> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);
    const startedAt = Date.now();

    try {
      const response = await this.post(payload, controller.signal);

      if (!response.ok) {
        const body = await readErrorBody(response);
        throw new SendError(
          `Collector responded with ${response.status}${body ? `: ${body}` : ''}`,
          { status: response.status },
        );
      }

      await discardBody(response);
      return { status: response.status, durationMs: Date.now() - startedAt };
    } finally {
      clearTimeout(timer);
    }
  }

  private async post(payload: Uint8Array, signal: AbortSignal): Promise<Response> {
    try {
      return await fetch(this.endpoint, {
        method: 'POST',
        headers: this.headers,
        body: payload,
        signal,
      });
    } catch (err) {
      const message = signal.aborted
        ? `Request to ${this.endpoint} timed out after ${this.timeout}ms`
        : `Request to ${this.endpoint} failed: ${errorMessage(err)}`;
      throw new SendError(message, { cause: err });
    }
  }
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    const text = await response.text();
    return text.trim().slice(0, MAX_ERROR_BODY);
  } catch (err) {
    getLogger().debug({ err }, 'Could not read collector error body');
    return '';
  }
}

// Releases the connection back to the pool; the body carries no contract.
async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (err) {
    getLogger().debug({ err }, 'Could not discard collector response body');
  }
}
