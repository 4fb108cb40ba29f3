import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

/**
 * A throwaway directory laid out like /proc, for pointing readers at.
 */
export interface ProcFixture {
  root: string;
  write(path: string, content: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  cleanup(): Promise<void>;
}

export async function createProcFixture(): Promise<ProcFixture> {
  const root = await mkdtemp(join(tmpdir(), 'hostpulse-proc-'));

  return {
    root,
    async write(path, content) {
      const target = join(root, path);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, 'utf8');
    },
    async mkdir(path) {
      await mkdir(join(root, path), { recursive: true });
    },
    async cleanup() {
      await rm(root, { recursive: true, force: true });
    },
  };
}

export const MEMINFO = [
  'MemTotal:       15976840 kB',
  'MemFree:         1234567 kB',
  'MemAvailable:    6032404 kB',
  'Buffers:          100000 kB',
  'Cached:          3000000 kB',
  'SwapCached:         1024 kB',
  'Active(anon):    2000000 kB',
  'SwapTotal:      16777212 kB',
  'SwapFree:       16773116 kB',
  'HugePages_Total:       0',
  '',
].join('\n');

export const NET_DEV_HEADER = [
  'Inter-|   Receive                                                |  Transmit',
  ' face |bytes    packets errs drop fifo frame compressed multicast|bytes    packets errs drop fifo colls carrier compressed',
].join('\n');
