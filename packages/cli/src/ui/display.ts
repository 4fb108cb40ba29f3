import chalk from 'chalk';
import type { Snapshot } from '@hostpulse/shared';
import { averageCpu, formatBytes, formatCpuDisplay, formatUsage } from '../utils/format.js';

export const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/**
 * Render one snapshot for the terminal, one metric family per block.
 */
export function renderSnapshot(snapshot: Snapshot, endpoint: string): string {
  const lines: string[] = [chalk.bold.cyan('=== hostpulse ===')];

  lines.push(`CPU cores: ${snapshot.cpu.length}`);
  snapshot.cpu.forEach((usage, i) => {
    lines.push(`  core ${i}: ${formatCpuDisplay(usage)}`);
  });
  lines.push(`Average CPU: ${formatCpuDisplay(averageCpu(snapshot.cpu))}`);

  lines.push(`Memory: ${formatUsage(snapshot.mem)}`);
  lines.push(`Swap: ${formatUsage(snapshot.swap)}`);

  lines.push('Network:');
  const names = Object.keys(snapshot.net).sort();
  if (names.length === 0) {
    lines.push(chalk.gray('  (no interfaces)'));
  }
  for (const name of names) {
    const { rx, tx } = snapshot.net[name];
    lines.push(`  ${name}: rx ${formatBytes(rx)}, tx ${formatBytes(tx)}`);
  }

  const { total, running, sleeping, zombie } = snapshot.proc;
  lines.push(
    `Processes: total ${total}, running ${running}, sleeping ${sleeping}, zombie ${zombie}`,
  );

  lines.push('');
  lines.push(chalk.gray(`Reporting to ${endpoint}`));
  lines.push(chalk.gray('Press Ctrl+C to exit'));

  return lines.join('\n');
}
