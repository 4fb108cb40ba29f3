import { describe, it, expect, vi } from 'vitest';

// Mock chalk to return plain text so we can test string content
vi.mock('chalk', () => {
  const handler: ProxyHandler<object> = {
    get(_target, prop) {
      if (prop === 'default') return chainable;
      return chainable;
    },
    apply(_target, _thisArg, args) {
      return String(args[0]);
    },
  };

  const chainable: unknown = new Proxy(function () {} as object, handler);

  return { default: chainable };
});

import { createSnapshot } from '@hostpulse/agent';
import { averageCpu, formatCpuDisplay, formatUsage } from '../utils/format.js';
import { renderSnapshot } from '../ui/display.js';

describe('formatCpuDisplay', () => {
  it('should render one decimal', () => {
    expect(formatCpuDisplay(12.34)).toBe('12.3%');
    expect(formatCpuDisplay(95)).toBe('95.0%');
  });
});

describe('formatUsage', () => {
  it('should render used, total and share', () => {
    expect(formatUsage({ total: 2048, used: 1024 })).toBe('1 KB / 2 KB (50.0%)');
  });

  it('should render a zero total as 0%', () => {
    expect(formatUsage({ total: 0, used: 0 })).toBe('0 B / 0 B (0.0%)');
  });
});

describe('averageCpu', () => {
  it('should average the cores', () => {
    expect(averageCpu([12.5, 87.5])).toBe(50);
  });

  it('should return 0 without cores', () => {
    expect(averageCpu([])).toBe(0);
  });
});

describe('renderSnapshot', () => {
  it('should render every metric family', () => {
    const snapshot = createSnapshot({
      cpu: [12.5, 87.5],
      mem: { total: 2048, used: 1024 },
      swap: { total: 0, used: 0 },
      net: { lo: { rx: 4094, tx: 4094 }, eth0: { rx: 1536, tx: 0 } },
      proc: { total: 280, running: 0, sleeping: 215, zombie: 0 },
    });

    expect(renderSnapshot(snapshot, 'http://localhost:25800').split('\n')).toEqual([
      '=== hostpulse ===',
      'CPU cores: 2',
      '  core 0: 12.5%',
      '  core 1: 87.5%',
      'Average CPU: 50.0%',
      'Memory: 1 KB / 2 KB (50.0%)',
      'Swap: 0 B / 0 B (0.0%)',
      'Network:',
      '  eth0: rx 1.5 KB, tx 0 B',
      '  lo: rx 4 KB, tx 4 KB',
      'Processes: total 280, running 0, sleeping 215, zombie 0',
      '',
      'Reporting to http://localhost:25800',
      'Press Ctrl+C to exit',
    ]);
  });

  it('should say so when there are no interfaces', () => {
    const snapshot = createSnapshot({
      cpu: [],
      mem: { total: 0, used: 0 },
      swap: { total: 0, used: 0 },
      net: {},
      proc: { total: 0, running: 0, sleeping: 0, zombie: 0 },
    });

    const lines = renderSnapshot(snapshot, 'http://localhost:25800').split('\n');
    expect(lines).toContain('  (no interfaces)');
    expect(lines).toContain('Average CPU: 0.0%');
  });
});
