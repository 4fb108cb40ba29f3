import type { Snapshot } from '@hostpulse/shared';
import { DecodeError, errorMessage, snapshotSchema } from '@hostpulse/shared';
import { createSnapshot } from './snapshot.js';

/**
 * Serialize a Snapshot as compact UTF-8 JSON. Key order is fixed and
 * interfaces are sorted by name, so equal snapshots encode to equal bytes.
 */
export function encode(snapshot: Snapshot): Buffer {
  const net: Record<string, { rx: number; tx: number }> = Object.fromEntries(
    Object.keys(snapshot.net)
      .sort()
      .map((name): [string, { rx: number; tx: number }] => {
        const { rx, tx } = snapshot.net[name];
        return [name, { rx, tx }];
      }),
  );

  const wire = {
    cpu: [...snapshot.cpu],
    mem: { total: snapshot.mem.total, used: snapshot.mem.used },
    swap: { total: snapshot.swap.total, used: snapshot.swap.used },
    net,
    proc: {
      total: snapshot.proc.total,
      running: snapshot.proc.running,
      sleeping: snapshot.proc.sleeping,
      zombie: snapshot.proc.zombie,
    },
  };

  return Buffer.from(JSON.stringify(wire), 'utf8');
}

/**
 * Parse and validate a payload produced by {@link encode}.
 */
export function decode(payload: Uint8Array | string): Snapshot {
  const text = typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(errorMessage(err));
  }

  const result = snapshotSchema.safeParse(parsed);
  if (!result.success) {
    throw new DecodeError(
      result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
    );
  }

  return createSnapshot(result.data);
}
