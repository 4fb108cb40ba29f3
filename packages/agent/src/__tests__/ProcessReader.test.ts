import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ProcessReader, parseProcessState } from '../readers/ProcessReader.js';
import { createProcFixture, MEMINFO, type ProcFixture } from './fixtures.js';

describe('parseProcessState', () => {
  it('should read the state after the command name', () => {
    expect(parseProcessState('1 (systemd) S 0 1 1 0 -1')).toBe('S');
  });

  it('should handle parentheses and spaces inside the command name', () => {
    expect(parseProcessState('42 (my (weird) proc) R 1 42')).toBe('R');
  });

  it('should return null for a line without a command name', () => {
    expect(parseProcessState('42 garbage')).toBeNull();
  });

  it('should return null when nothing follows the command name', () => {
    expect(parseProcessState('42 (truncated)')).toBeNull();
  });
});

describe('ProcessReader', () => {
  let fixture: ProcFixture;

  beforeEach(async () => {
    fixture = await createProcFixture();
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  it('should count processes by state', async () => {
    await fixture.write('meminfo', MEMINFO);
    await fixture.write('1/stat', '1 (systemd) S 0 1 1 0 -1\n');
    await fixture.write('2/stat', '2 (kthreadd) S 0 0 0 0 -1\n');
    await fixture.write('3/stat', '3 (my (weird) proc) R 1 3 3 0 -1\n');
    await fixture.write('4/stat', '4 (defunct) Z 1 4 4 0 -1\n');
    await fixture.write('5/stat', '5 (kworker/0:0) I 2 0 0 0 -1\n');
    await fixture.write('7/stat', '7 (flush) D 1 7 7 0 -1\n');
    await fixture.mkdir('sys');

    const reader = new ProcessReader({ procRoot: fixture.root, platform: 'linux' });

    await expect(reader.read()).resolves.toEqual({
      total: 6,
      running: 1,
      sleeping: 2,
      zombie: 1,
    });
  });

  it('should skip a process that exited before its stat was read', async () => {
    await fixture.write('1/stat', '1 (init) S 0 1 1 0 -1\n');
    await fixture.mkdir('6');

    const reader = new ProcessReader({ procRoot: fixture.root, platform: 'linux' });

    await expect(reader.read()).resolves.toEqual({
      total: 1,
      running: 0,
      sleeping: 1,
      zombie: 0,
    });
  });

  it('should report zeros for an empty process table', async () => {
    const reader = new ProcessReader({ procRoot: fixture.root, platform: 'linux' });

    await expect(reader.read()).resolves.toEqual({
      total: 0,
      running: 0,
      sleeping: 0,
      zombie: 0,
    });
  });

  it('should fail on a malformed stat line', async () => {
    await fixture.write('8/stat', '8 garbage\n');
    const reader = new ProcessReader({ procRoot: fixture.root, platform: 'linux' });

    await expect(reader.read()).rejects.toThrow('Failed to read proc: malformed stat for pid 8');
  });

  it('should fail when the process root cannot be listed', async () => {
    const reader = new ProcessReader({
      procRoot: `${fixture.root}/missing`,
      platform: 'linux',
    });

    await expect(reader.read()).rejects.toThrow(/^Failed to read proc: cannot list /);
  });

  it('should fail on platforms without procfs', async () => {
    const reader = new ProcessReader({ procRoot: fixture.root, platform: 'darwin' });

    await expect(reader.read()).rejects.toThrow('Failed to read proc: unsupported platform: darwin');
  });
});
