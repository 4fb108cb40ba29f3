import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ProcessStats } from '@hostpulse/shared';
import { ReadError, errorMessage } from '@hostpulse/shared';
import type { CounterReader } from './CounterReader.js';
import { assertLinux, isMissingEntry, type ProcfsOptions } from './procfs.js';

const PID_DIR = /^\d+$/;

/**
 * Extract the one-letter state from a /proc/<pid>/stat line. The command name
 * is wrapped in parentheses and may itself contain spaces or parentheses, so
 * the state is located after the last closing one.
 */
export function parseProcessState(stat: string): string | null {
  const end = stat.lastIndexOf(')');
  if (end === -1) return null;
  const state = stat.slice(end + 1).trimStart().charAt(0);
  return state === '' ? null : state;
}

/**
 * Counts processes by state. States other than running, sleeping and zombie
 * (disk sleep, stopped, idle, ...) count only toward the total.
 */
export class ProcessReader implements CounterReader<'proc'> {
  readonly tag = 'proc';
  private procRoot: string;
  private platform: NodeJS.Platform;

  constructor(options: ProcfsOptions) {
    this.procRoot = options.procRoot;
    this.platform = options.platform ?? process.platform;
  }

  async read(): Promise<ProcessStats> {
    assertLinux(this.tag, this.platform);

    let entries: string[];
    try {
      entries = await readdir(this.procRoot);
    } catch (err) {
      throw new ReadError('proc', `cannot list ${this.procRoot}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const states = await Promise.all(
      entries.filter((entry) => PID_DIR.test(entry)).map((pid) => this.readState(pid)),
    );

    const stats: ProcessStats = { total: 0, running: 0, sleeping: 0, zombie: 0 };
    for (const state of states) {
      // exited between listing and reading
      if (state === null) continue;

      stats.total += 1;
      switch (state) {
        case 'R':
          stats.running += 1;
          break;
        case 'S':
          stats.sleeping += 1;
          break;
        case 'Z':
          stats.zombie += 1;
          break;
      }
    }

    return stats;
  }

  private async readState(pid: string): Promise<string | null> {
    let stat: string;
    try {
      stat = await readFile(join(this.procRoot, pid, 'stat'), 'utf8');
    } catch (err) {
      if (isMissingEntry(err)) return null;
      throw new ReadError('proc', `cannot read stat of pid ${pid}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const state = parseProcessState(stat);
    if (state === null) {
      throw new ReadError('proc', `malformed stat for pid ${pid}`);
    }
    return state;
  }
}
