import type { MemoryStats, NetworkStats, ProcessStats, Snapshot } from '@hostpulse/shared';

/**
 * Build a deeply frozen Snapshot from its parts. Every record is copied so the
 * result shares nothing with the reader output it came from.
 */
export function createSnapshot(parts: {
  cpu: readonly number[];
  mem: MemoryStats;
  swap: MemoryStats;
  net: Readonly<Record<string, NetworkStats>>;
  proc: ProcessStats;
}): Snapshot {
  // fromEntries defines own keys, so an interface named __proto__ survives
  const net: Record<string, NetworkStats> = Object.fromEntries(
    Object.entries(parts.net).map(([name, { rx, tx }]): [string, NetworkStats] => [
      name,
      Object.freeze({ rx, tx }),
    ]),
  );

  return Object.freeze({
    cpu: Object.freeze([...parts.cpu]),
    mem: Object.freeze({ total: parts.mem.total, used: parts.mem.used }),
    swap: Object.freeze({ total: parts.swap.total, used: parts.swap.used }),
    net: Object.freeze(net),
    proc: Object.freeze({
      total: parts.proc.total,
      running: parts.proc.running,
      sleeping: parts.proc.sleeping,
      zombie: parts.proc.zombie,
    }),
  });
}
