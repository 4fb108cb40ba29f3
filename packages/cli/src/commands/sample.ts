import { Command } from 'commander';
import { Sampler, createDefaultReaders, encode } from '@hostpulse/agent';
import { createLogger, setDefaultLogger } from '@hostpulse/shared';
import { loadConfigOrReport, type CliOptions } from '../utils/config.js';

interface SampleOptions extends CliOptions {
  pretty?: boolean;
}

export const sampleCommand = new Command('sample')
  .description('Take one snapshot and print it as JSON without sending it')
  .option('--cpu-window <duration>', 'CPU sampling window')
  .option('-c, --config <file>', 'JSON configuration file')
  .option('--proc-root <dir>', 'procfs mount point')
  .option('--log-level <level>', 'Log level for reader diagnostics')
  .option('--pretty', 'Indent the JSON output')
  .action(async (options: SampleOptions) => {
    const config = loadConfigOrReport(options);
    if (!config) return;

    // stdout carries the JSON; diagnostics go to stderr
    setDefaultLogger(createLogger({ level: config.logLevel, destination: 2 }));

    const sampler = new Sampler(
      createDefaultReaders({
        procRoot: config.procRoot,
        cpuSampleWindow: config.cpuSampleWindow,
      }),
    );

    const snapshot = await sampler.sample();
    const payload = encode(snapshot).toString('utf8');

    console.log(options.pretty ? JSON.stringify(JSON.parse(payload), null, 2) : payload);
  });
