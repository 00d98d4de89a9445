#!/usr/bin/env node

import { join } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, applyOverrides, type RuntimeConfig } from './config/loader.js';
import { RunCoordinator, createRunDependencies } from './core/run-coordinator.js';
import type { ReportMode } from './issues/types.js';
import { Logger } from './logging/logger.js';
import { withCommandHandler } from './cli/command-error-handler.js';
import { collectItem, parseDate, parseMode } from './cli/options.js';

interface ConfigOption {
  config: string;
}

interface RunCommandOptions extends ConfigOption {
  mode?: ReportMode;
  items?: number[];
  department?: string[];
  region?: string[];
  startDate?: string;
  endDate?: string;
  statusesOnly?: boolean;
}

function createLogger(config: RuntimeConfig): Logger {
  return new Logger({
    source: 'relay',
    logDir: join(config.stateDir, 'logs'),
    level: config.logging.level,
    console: config.logging.console,
  });
}

const program = new Command();

program
  .name('cluster-relay')
  .description('Correlate anomaly issues into clusters and relay them as reports')
  .version('0.1.0');

// ─── run ──────────────────────────────────────────────
program
  .command('run')
  .description('Collect new issues, emit reports for eligible ones and refresh report statuses')
  .option('-c, --config <path>', 'Path to cluster-relay.config.json', 'cluster-relay.config.json')
  .option('-m, --mode <mode>', 'Override: skip | dry-run | submit | resubmit-unreported', parseMode)
  .option('-i, --items <ids...>', 'Override: item ids to collect', collectItem)
  .option('--department <codes...>', 'Keep only issues in these departments')
  .option('--region <codes...>', 'Keep only issues in these regions')
  .option('--start-date <date>', 'Feed window start (YYYY-MM-DD)', parseDate)
  .option('--end-date <date>', 'Feed window end (YYYY-MM-DD)', parseDate)
  .option('--statuses-only', 'Skip feed collection')
  .action(
    withCommandHandler(async (opts: RunCommandOptions) => {
      let config = await loadConfig(opts.config);
      config = applyOverrides(config, {
        mode: opts.mode,
        items: opts.items,
        departments: opts.department,
        regions: opts.region,
        startDate: opts.startDate,
        endDate: opts.endDate,
      });

      const logger = createLogger(config);
      const coordinator = new RunCoordinator(config, logger, createRunDependencies(config, logger));
      const summary = await coordinator.run({ statusesOnly: opts.statusesOnly ?? false });

      console.log(
        chalk.green(
          `✓ ${summary.emission.reportsCreated} report(s) emitted, ${summary.emission.linked} issue(s) linked, ` +
            `${summary.refresh.updated} status(es) refreshed`,
        ),
      );
    }),
  );

// ─── refresh ──────────────────────────────────────────
program
  .command('refresh')
  .description('Refresh the status of every unclosed report')
  .option('-c, --config <path>', 'Path to cluster-relay.config.json', 'cluster-relay.config.json')
  .action(
    withCommandHandler(async (opts: ConfigOption) => {
      const config = await loadConfig(opts.config);
      const logger = createLogger(config);
      const coordinator = new RunCoordinator(config, logger, createRunDependencies(config, logger));
      const summary = await coordinator.refresh();
      console.log(
        chalk.green(`✓ ${summary.updated} of ${summary.checked} status(es) refreshed`) +
          (summary.unanswered > 0 ? chalk.yellow(` (${summary.unanswered} without answer)`) : ''),
      );
    }),
  );

// ─── validate ─────────────────────────────────────────
program
  .command('validate')
  .description('Check the configuration file')
  .option('-c, --config <path>', 'Path to cluster-relay.config.json', 'cluster-relay.config.json')
  .action(
    withCommandHandler(async (opts: ConfigOption) => {
      const config = await loadConfig(opts.config);
      console.log(chalk.green('✓ Configuration is valid'));
      console.log(`  state directory: ${config.stateDir}`);
      console.log(`  report mode:     ${config.run.mode}`);
      for (const [itemId, item] of Object.entries(config.catalog)) {
        console.log(`  item ${itemId}: ${item.name} (${Object.keys(item.classes).length} class(es))`);
      }
    }),
  );

program.parse();
