import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ReadError, errorMessage } from '@hostpulse/shared';
import type { ReaderTag } from '@hostpulse/shared';

export interface ProcfsOptions {
  procRoot: string;
  platform?: NodeJS.Platform;
}

/**
 * Clamp a raw counter to a non-negative safe integer.
 */
export function toCount(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return Math.min(Math.trunc(value), Number.MAX_SAFE_INTEGER);
}

export function assertLinux(tag: ReaderTag, platform: NodeJS.Platform): void {
  if (platform !== 'linux') {
    throw new ReadError(tag, `unsupported platform: ${platform}`);
  }
}

export function isMissingEntry(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ESRCH';
}

export async function readProcText(
  tag: ReaderTag,
  procRoot: string,
  ...segments: string[]
): Promise<string> {
  const path = join(procRoot, ...segments);
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    throw new ReadError(tag, `cannot read ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Parse /proc/meminfo into a map of field name to bytes. Fields reported in kB
 * are scaled, unit-less fields (HugePages_Total and friends) are kept as is.
 */
export function parseMeminfo(text: string): Map<string, number> {
  const fields = new Map<string, number>();

  for (const line of text.split('\n')) {
    const match = /^([\w()]+):\s+(\d+)(\s+kB)?\s*$/.exec(line);
    if (!match) continue;
    const value = Number(match[2]);
    fields.set(match[1], match[3] ? value * 1024 : value);
  }

  return fields;
}
