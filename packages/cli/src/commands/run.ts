import { Command } from 'commander';
import { createAgent } from '@hostpulse/agent';
import type { Snapshot } from '@hostpulse/shared';
import { createLogger, formatDuration, getLogger, setDefaultLogger } from '@hostpulse/shared';
import { CLEAR_SCREEN, renderSnapshot } from '../ui/display.js';
import { loadConfigOrReport, type CliOptions } from '../utils/config.js';

export const runCommand = new Command('run')
  .description('Sample the host on an interval and post each snapshot to the collector')
  .option('-e, --endpoint <url>', 'Collector URL')
  .option('-i, --interval <duration>', 'Reporting interval, e.g. 5s (a bare number is seconds)')
  .option('--cpu-window <duration>', 'CPU sampling window, shorter than the interval')
  .option('--timeout <duration>', 'Send timeout')
  .option('--token <token>', 'Bearer token sent to the collector')
  .option('--no-display', 'Only send snapshots, do not print them')
  .option('-c, --config <file>', 'JSON configuration file')
  .option('--proc-root <dir>', 'procfs mount point')
  .option('--log-level <level>', 'Log level (trace|debug|info|warn|error|fatal|silent)')
  .action(async (options: CliOptions) => {
    const config = loadConfigOrReport(options);
    if (!config) return;

    setDefaultLogger(
      createLogger({ level: config.logLevel, pretty: process.env.NODE_ENV !== 'production' }),
    );
    const logger = getLogger();
    const agent = createAgent(config);

    if (config.display) {
      agent.on('snapshot', (snapshot: Snapshot) => {
        process.stdout.write(CLEAR_SCREEN + renderSnapshot(snapshot, config.endpoint) + '\n');
      });
    }

    logger.info(
      { endpoint: config.endpoint, interval: formatDuration(config.interval) },
      'Monitoring host resources',
    );

    // Resolves once a shutdown signal has stopped the agent
    await new Promise<void>((resolve) => {
      const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'Shutting down');
        agent.stop().then(resolve, (err: unknown) => {
          logger.error({ err }, 'Agent did not stop cleanly');
          resolve();
        });
      };

      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
      agent.start();
    });
  });
