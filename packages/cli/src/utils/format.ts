import chalk from 'chalk';
import type { MemoryStats } from '@hostpulse/shared';
import { formatBytes, formatPercent, percentOf } from '@hostpulse/shared';

export { formatBytes, formatPercent };

export function formatCpuDisplay(cpu: number): string {
  const str = formatPercent(cpu);
  if (cpu > 80) return chalk.red(str);
  if (cpu > 50) return chalk.yellow(str);
  return chalk.green(str);
}

export function formatUsage(stats: MemoryStats): string {
  const pct = formatPercent(percentOf(stats.used, stats.total));
  return `${formatBytes(stats.used)} / ${formatBytes(stats.total)} (${pct})`;
}

export function averageCpu(cpu: readonly number[]): number {
  if (cpu.length === 0) return 0;
  return cpu.reduce((a, b) => a + b, 0) / cpu.length;
}
