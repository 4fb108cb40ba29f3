import type { ReadError, ReaderTag, Snapshot } from '@hostpulse/shared';

export interface ReaderFailure {
  tag: ReaderTag;
  error: ReadError;
}

export interface SampleReport {
  snapshot: Snapshot;
  failures: ReaderFailure[];
}

export interface SendAck {
  status: number;
  durationMs: number;
}

/**
 * Produces one snapshot per call and never rejects.
 */
export interface SnapshotSource {
  sampleWithReport(): Promise<SampleReport>;
}

/**
 * Delivers one encoded payload. Rejects with a SendError.
 */
export interface PayloadSender {
  send(payload: Uint8Array): Promise<SendAck>;
}

export interface AgentStats {
  cycles: number;
  sent: number;
  failed: number;
  skipped: number;
}

export type AgentEvent =
  | 'started'
  | 'stopped'
  | 'snapshot'
  | 'sent'
  | 'send-error'
  | 'read-error'
  | 'cycle-skipped';
