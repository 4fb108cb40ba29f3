import type { NetworkStats } from '@hostpulse/shared';
import { ReadError } from '@hostpulse/shared';
import type { CounterReader } from './CounterReader.js';
import { assertLinux, readProcText, toCount, type ProcfsOptions } from './procfs.js';

// /proc/net/dev columns after the interface name: eight receive counters,
// then eight transmit counters. Bytes lead each group.
const RX_BYTES = 0;
const TX_BYTES = 8;
const HEADER_LINES = 2;

/**
 * Raw cumulative byte counters for every interface the kernel lists,
 * loopback and virtual ones included. Counters are never diffed.
 */
export class NetworkReader implements CounterReader<'net'> {
  readonly tag = 'net';
  private procRoot: string;
  private platform: NodeJS.Platform;

  constructor(options: ProcfsOptions) {
    this.procRoot = options.procRoot;
    this.platform = options.platform ?? process.platform;
  }

  async read(): Promise<Record<string, NetworkStats>> {
    assertLinux(this.tag, this.platform);

    const text = await readProcText('net', this.procRoot, 'net', 'dev');
    return parseNetDev(text);
  }
}

export function parseNetDev(text: string): Record<string, NetworkStats> {
  const lines = text.split('\n');
  if (lines.length < HEADER_LINES || !lines[0].includes('|')) {
    throw new ReadError('net', 'missing /proc/net/dev header');
  }

  const interfaces: [string, NetworkStats][] = [];

  for (const line of lines.slice(HEADER_LINES)) {
    if (line.trim() === '') continue;

    const colon = line.indexOf(':');
    if (colon === -1) {
      throw new ReadError('net', `malformed interface line: "${line.trim()}"`);
    }

    const name = line.slice(0, colon).trim();
    const columns = line
      .slice(colon + 1)
      .trim()
      .split(/\s+/);

    if (name === '' || columns.length <= TX_BYTES || !columns.every((c) => /^\d+$/.test(c))) {
      throw new ReadError('net', `malformed counters for interface "${name}"`);
    }

    interfaces.push([
      name,
      {
        rx: toCount(Number(columns[RX_BYTES])),
        tx: toCount(Number(columns[TX_BYTES])),
      },
    ]);
  }

  return Object.fromEntries(interfaces);
}
