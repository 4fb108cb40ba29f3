import { EventEmitter } from 'node:events';
import type { ResolvedAgentConfig } from '@hostpulse/shared';
import { SendError, getLogger } from '@hostpulse/shared';
import { encode } from './encoder.js';
import { createDefaultReaders } from './readers/index.js';
import { Reporter } from './Reporter.js';
import { Sampler } from './Sampler.js';
import type { AgentStats, PayloadSender, SnapshotSource } from './types.js';

export interface AgentOptions {
  /** Milliseconds between cycles. */
  interval: number;
  source: SnapshotSource;
  sender: PayloadSender;
}

/**
 * Drives the sample → encode → send pipeline on a fixed interval.
 *
 * One cycle runs at a time: a tick that fires while the previous cycle is
 * still in flight is dropped. Read and send failures end only the cycle they
 * occur in. A throwing listener is logged and never cancels a send.
 *
 * Events: `started`, `stopped`, `snapshot`, `sent`, `send-error`,
 * `read-error`, `cycle-skipped`.
 */
export class Agent extends EventEmitter {
  private interval: number;
  private source: SnapshotSource;
  private sender: PayloadSender;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private stats: AgentStats = { cycles: 0, sent: 0, failed: 0, skipped: 0 };

  constructor(options: AgentOptions) {
    super();
    this.interval = options.interval;
    this.source = options.source;
    this.sender = options.sender;
  }

  /**
   * Run the first cycle now and schedule the rest. No-op when already running.
   */
  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      void this.runCycle();
    }, this.interval);

    getLogger().info({ interval: this.interval }, 'Agent started');
    this.emit('started');
    void this.runCycle();
  }

  /**
   * Cancel the schedule and wait for the in-flight cycle, if any.
   */
  async stop(): Promise<void> {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;

    if (this.inFlight) {
      await this.inFlight;
    }

    getLogger().info({ ...this.stats }, 'Agent stopped');
    this.emit('stopped');
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getStats(): AgentStats {
    return { ...this.stats };
  }

  /**
   * Run one cycle unless another is still in flight. Never rejects.
   */
  runCycle(): Promise<void> {
    if (this.inFlight) {
      this.stats.skipped += 1;
      getLogger().warn('Previous cycle still in flight, skipping this one');
      this.notify('cycle-skipped');
      return this.inFlight;
    }

    this.inFlight = this.executeCycle().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async executeCycle(): Promise<void> {
    this.stats.cycles += 1;
    const cycle = this.stats.cycles;

    try {
      const { snapshot, failures } = await this.source.sampleWithReport();
      for (const failure of failures) {
        this.notify('read-error', failure);
      }
      this.notify('snapshot', snapshot);

      const payload = encode(snapshot);
      const ack = await this.sender.send(payload);

      this.stats.sent += 1;
      getLogger().debug(
        { cycle, status: ack.status, durationMs: ack.durationMs, bytes: payload.length },
        'Snapshot sent',
      );
      this.notify('sent', ack);
    } catch (err) {
      this.stats.failed += 1;
      if (err instanceof SendError) {
        getLogger().error({ cycle, status: err.status, err }, 'Failed to send snapshot');
        this.notify('send-error', err);
      } else {
        getLogger().error({ cycle, err }, 'Cycle failed');
      }
    }
  }

  private notify(event: string, ...args: unknown[]): void {
    try {
      this.emit(event, ...args);
    } catch (err) {
      getLogger().error({ err, event }, 'Agent event listener threw');
    }
  }
}

/**
 * Wire the host readers, sampler and HTTP reporter from a resolved config.
 */
export function createAgent(config: ResolvedAgentConfig): Agent {
  const readers = createDefaultReaders({
    procRoot: config.procRoot,
    cpuSampleWindow: config.cpuSampleWindow,
  });

  return new Agent({
    interval: config.interval,
    source: new Sampler(readers),
    sender: new Reporter({
      endpoint: config.endpoint,
      timeout: config.timeout,
      token: config.token,
      headers: config.headers,
    }),
  });
}
