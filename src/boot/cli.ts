/**
 * Command line interface
 *
 * run      poll the controller and record history until interrupted
 * report   print or export the history of a device
 * devices  list configured devices and tag addresses
 */

import * as fs from 'fs';

import chalk from 'chalk';
import { Command } from 'commander';

import { ConfigurationError, describeError } from '$types/errors';
import { listTags } from '@core/tag-map';
import { REPORT_PRESETS, createReportService, isReportPreset } from '@features/reports';
import { startLiveFeed } from '@features/live-feed';
import { bitAddress, realAddress } from '@hardware/s7';
import { createSilentLogger } from '@logging';
import { createSqliteStore, openDatabase } from '@persistence';

import { DEFAULT_ENV_PATH, loadConfig, loadEnvironment, resolveConfigPath } from './config';
import { announce, initialize, nodeRuntime } from './init';

import type { TagRef } from '@core/tag-map';
import type { LiveFeedServer } from '@features/live-feed';
import type { ReportData, ReportService } from '@features/reports';
import type { LoadedConfig, ReadTextFile, RuntimeDependencies } from './types';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  env: NodeJS.ProcessEnv;
  readFile: ReadTextFile;
  writeFile(filePath: string, content: string): void;
  setExitCode(code: number): void;
  runtime(): RuntimeDependencies;
  /** Terminal colours; a level-0 instance prints plain text */
  colors: chalk.Chalk;
  /** Load `.env` before reading the configuration */
  loadEnv: boolean;
  /** Where SIGINT/SIGTERM come from */
  signals: SignalSource;
}

/**
 * The part of process that delivers termination signals
 */
export interface SignalSource {
  once(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

type GlobalOptions = {
  config?: string;
  env?: string;
};

interface ReportOptions {
  preset?: string;
  csv?: string;
}

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Standard streams, the real file system and process signals
 */
export function nodeIo(): CliIo {
  return {
    out: function(line) { console.log(line); },
    err: function(line) { console.error(line); },
    env: process.env,
    readFile: function(filePath) { return fs.readFileSync(filePath, 'utf8'); },
    writeFile: function(filePath, content) { fs.writeFileSync(filePath, content, 'utf8'); },
    setExitCode: function(code) { process.exitCode = code; },
    runtime: nodeRuntime,
    colors: chalk,
    loadEnv: true,
    signals: process
  };
}

function tagAddress(tag: TagRef): string {
  if (tag.kind === 'real') return realAddress(tag.block, tag.offset);
  if (tag.kind === 'bool') return bitAddress(tag.block, tag.byte, tag.bit);
  return 'not read: ' + tag.reason;
}

function fixed(value: number | null): string {
  return value === null ? '--' : value.toFixed(2);
}

function span(values: Array<number | null>): string {
  const present = values.filter(function(v): v is number { return v !== null; });
  if (present.length === 0) return '--';
  return Math.min(...present).toFixed(2) + '..' + Math.max(...present).toFixed(2);
}

/**
 * Create the program
 *
 * @param io - Process boundary, replaced in tests
 *
 * @example
 * ```typescript
 * await createProgram().parseAsync(process.argv);
 * ```
 */
export function createProgram(io: CliIo = nodeIo()): Command {
  const c = io.colors;
  const program = new Command();

  program
    .name('plant-telemetry')
    .description('Pump station telemetry: acquisition, history and reports')
    .option('-c, --config <path>', 'configuration file (default: $PLANT_CONFIG or config.json)')
    .option('--env <path>', 'dotenv file', DEFAULT_ENV_PATH)
    .showHelpAfterError();

  function load(): LoadedConfig {
    const options = program.opts<GlobalOptions>();
    if (io.loadEnv) {
      loadEnvironment(options.env);
    }
    return loadConfig(resolveConfigPath(options.config, io.env), io.env, io.readFile);
  }

  function fail(err: unknown): void {
    if (err instanceof ConfigurationError) {
      io.err(c.red('✗ ' + err.message));
      for (const issue of err.issues) {
        io.err(c.red('  [' + issue.field + ']: ' + issue.message));
      }
    } else {
      io.err(c.red('✗ ' + describeError(err)));
    }
    io.setExitCode(EXIT_FAILURE);
  }

  // ═══════════════════════════════════════════════════════════════
  // RUN
  // ═══════════════════════════════════════════════════════════════

  async function run(): Promise<void> {
    const loaded = load();
    const service = initialize(loaded.config, io.runtime());
    const logger = service.logger;
    await announce(service, loaded.warnings);

    let live: LiveFeedServer | null = null;
    if (loaded.config.live.enabled) {
      try {
        live = await startLiveFeed(loaded.config.live, service.store, logger);
      } catch (err) {
        logger.warning('Live feed not started: ' + describeError(err));
      }
    }

    const controller = new AbortController();
    function stop(signal: NodeJS.Signals): void {
      logger.info('Received ' + signal + ', stopping');
      controller.abort();
    }
    io.signals.once('SIGINT', stop);
    io.signals.once('SIGTERM', stop);

    try {
      await service.poller.run(controller.signal);
    } finally {
      io.signals.off('SIGINT', stop);
      io.signals.off('SIGTERM', stop);
      if (live !== null) {
        await live.close();
      }
      service.close();
    }

    if (!controller.signal.aborted) {
      io.setExitCode(EXIT_FAILURE);
    }
  }

  program
    .command('run')
    .description('poll the controller and record samples and trip events')
    .action(async function() {
      try {
        await run();
      } catch (err) {
        fail(err);
      }
    });

  // ═══════════════════════════════════════════════════════════════
  // REPORT
  // ═══════════════════════════════════════════════════════════════

  function printReport(result: ReportData): void {
    const range = result.range;
    io.out(c.bold('Report ' + range.device + ' ' + range.startDate + ' to ' + range.endDate));
    io.out('Samples: ' + result.samples.length + '  Events: ' + result.events.length);

    for (const series of result.series) {
      io.out('  ' + c.cyan(series.deviceId) + '  ' + series.points.length + ' samples' +
        '  pressure ' + span(series.points.map(function(p) { return p.pressure; })) +
        '  speed ' + span(series.points.map(function(p) { return p.speed; })));
    }

    if (result.events.length > 0) {
      io.out(c.bold('Events'));
      for (const event of result.events) {
        io.out('  ' + event.timestamp + '  ' + c.red(event.event) + '  ' + event.deviceId +
          '  pressure=' + fixed(event.pressure) + ' speed=' + fixed(event.speed));
      }
    }
  }

  function exportReport(reports: ReportService, device: string, startDate: string, endDate: string, target: string): void {
    const result = reports.exportCsv(device, startDate, endDate);
    if (result.status === 'invalid-range') {
      io.err(c.red('✗ ' + result.message));
      io.setExitCode(EXIT_USAGE);
      return;
    }
    if (result.status === 'empty') {
      io.out(c.yellow('No samples for ' + result.range.device + ' between ' + result.range.startDate + ' and ' + result.range.endDate));
      return;
    }
    if (target === '-') {
      io.out(result.content.trimEnd());
      return;
    }
    const filePath = target === '' ? result.filename : target;
    io.writeFile(filePath, result.content);
    io.out(c.green('✓ Wrote ' + filePath));
  }

  function report(device: string, start: string | undefined, end: string | undefined, options: ReportOptions): void {
    const loaded = load();
    const db = openDatabase(loaded.config.databasePath, { readonly: true });
    const persistence = createSqliteStore(db, createSilentLogger());

    try {
      const reports = createReportService(persistence, io.runtime().clock);
      let startDate = start;
      let endDate = end;
      if (options.preset !== undefined) {
        if (!isReportPreset(options.preset)) {
          io.err(c.red('✗ Unknown preset "' + options.preset + '" (use ' + REPORT_PRESETS.join(' or ') + ')'));
          io.setExitCode(EXIT_USAGE);
          return;
        }
        const dates = reports.presetRange(options.preset);
        startDate = dates.startDate;
        endDate = dates.endDate;
      }
      if (startDate === undefined) {
        io.err(c.red('✗ Give a start date or --preset'));
        io.setExitCode(EXIT_USAGE);
        return;
      }
      if (endDate === undefined) {
        endDate = startDate;
      }

      if (options.csv !== undefined) {
        exportReport(reports, device, startDate, endDate, options.csv);
        return;
      }

      const result = reports.report(device, startDate, endDate);
      if (result.status === 'invalid-range') {
        io.err(c.red('✗ ' + result.message));
        io.setExitCode(EXIT_USAGE);
      } else if (result.status === 'empty') {
        io.out(c.yellow('No data for ' + result.range.device + ' between ' + result.range.startDate + ' and ' + result.range.endDate));
      } else {
        printReport(result);
      }
    } finally {
      persistence.close();
    }
  }

  program
    .command('report')
    .description('summarize samples and trip events between two dates (inclusive)')
    .argument('<device>', 'device id or "all"')
    .argument('[start]', 'first day, YYYY-MM-DD')
    .argument('[end]', 'last day, YYYY-MM-DD (default: start)')
    .option('-p, --preset <name>', 'yesterday or last-7-days')
    .option('--csv [file]', 'export samples as CSV ("-" for stdout)')
    .action(function(device: string, start: string | undefined, end: string | undefined, options: { preset?: string; csv?: string | true }) {
      try {
        const csv = options.csv === true ? '' : options.csv;
        report(device, start, end, { preset: options.preset, csv: csv });
      } catch (err) {
        fail(err);
      }
    });

  // ═══════════════════════════════════════════════════════════════
  // DEVICES
  // ═══════════════════════════════════════════════════════════════

  program
    .command('devices')
    .description('list configured devices and their tag addresses')
    .action(function() {
      try {
        const tags = load().config.tags;
        const endpoint = tags.endpoint;
        io.out(c.bold('Controller ' + endpoint.host + ':' + endpoint.port + ' rack ' + endpoint.rack + ' slot ' + endpoint.slot));
        io.out(c.bold('Pumps'));
        for (const pump of tags.pumps) {
          io.out('  ' + pump.id + '  ' + pump.label);
        }
        io.out(c.bold('Chillers'));
        for (const chiller of tags.chillers) {
          io.out('  ' + chiller.id + '  ' + chiller.label);
        }
        io.out(c.bold('Tags'));
        for (const tag of listTags(tags)) {
          const address = tagAddress(tag);
          io.out('  ' + tag.signal + '  ' + (tag.kind === 'malformed' ? c.yellow(address) : address));
        }
      } catch (err) {
        fail(err);
      }
    });

  return program;
}
