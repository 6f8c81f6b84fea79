#!/usr/bin/env node

import chalk from 'chalk';
import { Command } from 'commander';
import { config } from 'dotenv';
import {
  buildPattern,
  collect,
  parseHeaders,
  parseRunOverrides,
  reportFormatFor,
  type RunCommandOptions,
} from './cli-options.js';
import { loadConfig, resolveRunConfig } from './config.js';
import { describeError } from './errors.js';
import { LoadTest } from './load-test.js';
import { PATTERN_DESCRIPTIONS } from './patterns.js';
import { isExportFormat, printResults } from './reporter.js';
import { httpWorkload } from './workloads/index.js';

// Load environment variables
config();

const program = new Command();

program
  .name('loadpulse')
  .description('Drive rate-controlled synthetic load against an HTTP endpoint')
  .version('0.1.0');

program
  .command('run')
  .description('Send requests to <url> following a traffic pattern')
  .argument('[url]', 'Target URL (defaults to LOADPULSE_TARGET_URL)')
  .option('-n, --name <name>', 'Test name shown in the report')
  .option('-p, --pattern <kind>', 'Traffic pattern (see `loadpulse patterns`)', 'constant')
  .option('-r, --rate <rps>', 'Requests per second for constant/steady, upper rate for others')
  .option('--start-rate <rps>', 'Start rate for ramp and step')
  .option('--end-rate <rps>', 'End rate for ramp and step')
  .option('--ramp-duration <seconds>', 'Ramp length (defaults to the run duration)')
  .option('--steps <count>', 'Number of steps for step')
  .option('--step-duration <seconds>', 'Seconds per step')
  .option('--baseline-rate <rps>', 'Baseline rate for spike')
  .option('--spike-rate <rps>', 'Peak rate for spike')
  .option('--spike-duration <seconds>', 'Spike length')
  .option('--interval <seconds>', 'Spike period, or chaos change interval')
  .option('--burst-rate <rps>', 'Peak rate for burst')
  .option('--burst-duration <seconds>', 'Burst length')
  .option('--delay <seconds>', 'Seconds before the burst')
  .option('--jitter <fraction>', 'Jitter for steady, in [0, 1)')
  .option('--min-rate <rps>', 'Lower rate for chaos and wave')
  .option('--max-rate <rps>', 'Upper rate for chaos and wave')
  .option('--period <seconds>', 'Wave period')
  .option('--waveform <shape>', 'sine, square or sawtooth')
  .option('-d, --duration <seconds>', 'Measured duration after warmup')
  .option('-w, --warmup <seconds>', 'Warmup excluded from statistics')
  .option('-c, --concurrency <number>', 'Maximum executions in flight')
  .option('-q, --queue <number>', 'Events that may wait for a free slot')
  .option('-t, --timeout <seconds>', 'Per-request timeout')
  .option('--grace <seconds>', 'How long to wait for in-flight requests at the end')
  .option('-X, --method <method>', 'HTTP method', 'GET')
  .option('-H, --header <header>', 'Request header "Name: value" (repeatable)', collect, [])
  .option('--body <body>', 'Request body')
  .option('--seed <number>', 'Seed for workload selection and random patterns')
  .option('-o, --output <format>', 'Output format: pretty, json, csv, prometheus', 'pretty')
  .option('--report <file>', 'Also write the report to a file (.json, .csv or .prom)')
  .action(async (url: string | undefined, options: RunCommandOptions) => {
    try {
      const env = loadConfig();
      const target = url ?? env.targetUrl;
      if (!target) {
        console.error(chalk.red('Error: target URL required. Pass it as an argument or set LOADPULSE_TARGET_URL'));
        process.exit(2);
      }

      const format = options.output;
      if (!isExportFormat(format)) {
        console.error(chalk.red(`Error: unknown output format "${format}". Use pretty, json, csv or prometheus`));
        process.exit(2);
      }

      const runConfig = resolveRunConfig({ name: `loadpulse ${target}` }, env.run, parseRunOverrides(options), {
        consoleOutput: format === 'pretty',
      });

      const headers = parseHeaders(options.header);
      if (env.authToken && !Object.keys(headers).some((key) => key.toLowerCase() === 'authorization')) {
        headers.Authorization = `Bearer ${env.authToken}`;
      }

      const test = new LoadTest(runConfig)
        .addScenario(
          httpWorkload({
            name: `${options.method.toUpperCase()} ${new URL(target).pathname}`,
            url: target,
            method: options.method,
            headers,
            body: options.body,
          }),
        )
        .setPattern(buildPattern(options, runConfig.duration));

      let interrupts = 0;
      const onInterrupt = (): void => {
        interrupts += 1;
        if (interrupts === 1) {
          console.error(chalk.yellow('\nStopping after in-flight requests finish (Ctrl+C again to cancel)...'));
          test.stop();
        } else {
          test.cancel();
        }
      };
      process.on('SIGINT', onInterrupt);

      const result = await test.run().finally(() => process.off('SIGINT', onInterrupt));

      if (format === 'prometheus') {
        console.log(await test.report('prometheus'));
      } else {
        printResults(result, { format });
      }
      if (options.report) {
        await test.report(reportFormatFor(options.report), options.report);
        if (format === 'pretty') console.log(chalk.gray(`Report written to ${options.report}`));
      }

      process.exit(result.failed > 0 ? 1 : 0);
    } catch (error) {
      const { message, suggestion } = describeError(error);
      console.error(chalk.red(`Error: ${message}`));
      if (suggestion) console.error(chalk.gray(`Hint: ${suggestion}`));
      process.exit(2);
    }
  });

program
  .command('patterns')
  .description('List the available traffic patterns')
  .action(() => {
    for (const [kind, description] of Object.entries(PATTERN_DESCRIPTIONS)) {
      console.log(`  ${chalk.cyan(kind.padEnd(11))}${description}`);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${describeError(error).message}`));
  process.exit(2);
});
