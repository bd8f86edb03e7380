#!/usr/bin/env node
import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { Duplicator, DUPLICATOR_MODES, type DuplicatorMode } from './automation/duplicator.js';
import { describeFilters } from './automation/filter.js';
import {
  ConfigError,
  DEFAULT_REDIRECT_URI,
  doctorReport,
  filtersFromEnv,
  readEnv,
  resolveRunSettings,
} from './config.js';
import { loadEnvFiles } from './env.js';
import { createLogger } from './log.js';
import { TaskStatus } from './model.js';
import { createNotifier } from './notify.js';
import { MockTaskService } from './providers/mock.js';
import { authorizeUrl, exchangeAuthorizationCode, TickTickService } from './providers/ticktick.js';
import { exitCodeFor, formatReport, type ReportFormat } from './report.js';
import { runScheduler } from './scheduler.js';
import { JsonStore } from './store/jsonStore.js';

loadEnvFiles();

function positiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('Must be a positive number.');
  return n;
}

function nonNegativeNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError('Must be zero or a positive number.');
  return n;
}

const program = new Command();

program
  .name('ticktick-duplicator')
  .description('Re-create completed TickTick tasks without their due dates')
  .version('0.1.0');

program
  .command('run', { isDefault: true })
  .description('Poll TickTick and duplicate completed tasks that match the filters')
  .option('--once', 'Run a single pass and exit (default: keep polling)')
  .option('--interval <seconds>', 'Seconds between passes (overrides POLLING_INTERVAL)', positiveNumber)
  .addOption(new Option('--mode <mode>', 'How completions are detected').choices(DUPLICATOR_MODES))
  .option('--window-hours <hours>', 'Completed mode: only tasks completed in the last N hours (0 = all)', nonNegativeNumber)
  .option('--state-file <path>', 'State file (overrides DUPLICATOR_STATE_FILE)')
  .option('--dry-run', 'Report what would be duplicated without creating tasks or writing state')
  .addOption(new Option('--format <format>', 'Report format').choices(['pretty', 'json']).default('pretty'))
  .option('-v, --verbose', 'Debug logging')
  .action(
    async (opts: {
      once?: boolean;
      interval?: number;
      mode?: DuplicatorMode;
      windowHours?: number;
      stateFile?: string;
      dryRun?: boolean;
      format: ReportFormat;
      verbose?: boolean;
    }) => {
      const settings = resolveRunSettings(readEnv(), {
        intervalSeconds: opts.interval,
        mode: opts.mode,
        windowHours: opts.windowHours,
        stateFile: opts.stateFile,
        verbose: opts.verbose,
      });
      const logger = createLogger(settings.logLevel, { file: settings.logFile });
      const notifier = createNotifier(settings.notify, logger);

      const service = new TickTickService({
        accessToken: settings.accessToken,
        rps: settings.rps,
        timeoutMs: settings.timeoutMs,
        logger,
      });
      const store = new JsonStore(settings.stateFile, logger);
      const duplicator = new Duplicator(service, store, {
        mode: settings.mode,
        filters: settings.filters,
        windowHours: settings.windowHours,
        dryRun: !!opts.dryRun,
        logger,
      });

      const controller = new AbortController();
      const onSignal = (signal: NodeJS.Signals) => {
        if (controller.signal.aborted) {
          logger.warn(`received ${signal} again, exiting now`);
          process.exit(130);
        }
        logger.info(`received ${signal}; stopping after the current pass`);
        controller.abort();
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);

      logger.info(
        opts.once
          ? 'running a single pass'
          : `polling every ${settings.intervalSeconds}s (Ctrl+C to stop)`,
        { mode: settings.mode, stateFile: store.statePath(), filters: describeFilters(settings.filters) },
      );
      notifier.notify('TickTick duplicator', 'Automation starting');

      try {
        await runScheduler({
          runPass: () => duplicator.runPass(),
          intervalMs: settings.intervalSeconds * 1000,
          once: !!opts.once,
          signal: controller.signal,
          logger,
          notifier,
          onPass: (report) => {
            if (opts.once || opts.format === 'json' || opts.dryRun) console.log(formatReport(report, opts.format));
            process.exitCode = exitCodeFor(report);
          },
        });
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        notifier.notify('TickTick duplicator', 'Automation ending');
      }
    },
  );

program
  .command('doctor')
  .description('Check environment/config and print what is missing')
  .action(() => {
    const report = doctorReport();
    console.log('ticktick-duplicator doctor');
    console.log(`mode: ${report.mode}`);
    console.log(`filters: ${describeFilters(report.filters)}`);
    console.log(`state file: ${path.resolve(report.stateFile)}`);
    console.log(`polling interval: ${report.pollingIntervalSeconds}s`);

    if (report.missing.length) {
      console.log('\nMissing env vars:');
      for (const k of report.missing) console.log(`- ${k}`);
      process.exitCode = 2;
    } else {
      console.log('\nNo missing env vars detected.');
    }

    if (report.notes.length) {
      console.log('\nNotes:');
      for (const n of report.notes) console.log(`- ${n}`);
    }
  });

program
  .command('projects')
  .description('List the projects (lists) visible to the access token')
  .option('-v, --verbose', 'Debug logging')
  .action(async (opts: { verbose?: boolean }) => {
    const settings = resolveRunSettings(readEnv(), { verbose: opts.verbose });
    const logger = createLogger(settings.logLevel, { file: settings.logFile });
    const service = new TickTickService({
      accessToken: settings.accessToken,
      rps: settings.rps,
      timeoutMs: settings.timeoutMs,
      logger,
    });

    for (const p of await service.listProjects()) {
      console.log(`${p.id}\t${p.name ?? '(unnamed)'}${p.closed ? '\t(closed)' : ''}`);
    }
  });

program
  .command('auth')
  .description('OAuth helper: print the consent URL, or exchange a code for an access token')
  .option('--code <code>', 'Authorization code from the redirect')
  .action(async (opts: { code?: string }) => {
    const env = readEnv();
    if (!env.TICKTICK_CLIENT_ID || !env.TICKTICK_CLIENT_SECRET) {
      throw new ConfigError('TICKTICK_CLIENT_ID and TICKTICK_CLIENT_SECRET are required for auth.');
    }
    const redirectUri = env.TICKTICK_REDIRECT_URI ?? DEFAULT_REDIRECT_URI;

    if (!opts.code) {
      console.log('1) Open this URL in your browser and consent:');
      console.log(authorizeUrl(env.TICKTICK_CLIENT_ID, redirectUri));
      console.log('\n2) Copy the `code` query parameter from the redirect and run:');
      console.log('   ticktick-duplicator auth --code <code>');
      return;
    }

    const token = await exchangeAuthorizationCode(
      { clientId: env.TICKTICK_CLIENT_ID, clientSecret: env.TICKTICK_CLIENT_SECRET, redirectUri },
      opts.code,
    );
    console.log('Set this env var:');
    console.log(`TICKTICK_ACCESS_TOKEN=${token.access_token}`);
    if (token.expires_in) console.log(`(expires in ${Math.round(token.expires_in / 86400)} days)`);
  });

program
  .command('mock')
  .description('Run one pass against an in-memory task service (for demos/tests)')
  .addOption(new Option('--format <format>', 'Report format').choices(['pretty', 'json']).default('pretty'))
  .action(async (opts: { format: ReportFormat }) => {
    const env = readEnv();
    const logger = createLogger(env.DUPLICATOR_LOG_LEVEL ?? 'info');
    const service = new MockTaskService({
      tasks: [
        {
          id: 't1',
          projectId: 'inbox',
          title: 'Zap: buy milk',
          status: TaskStatus.Completed,
          tags: ['errand'],
          dueDate: new Date().toISOString(),
          completedTime: new Date().toISOString(),
        },
        { id: 't2', projectId: 'inbox', title: 'File taxes', status: TaskStatus.Completed, tags: [] },
      ],
    });
    const dir = await mkdtemp(path.join(os.tmpdir(), 'ticktick-duplicator-'));
    const duplicator = new Duplicator(service, new JsonStore(path.join(dir, 'state.json'), logger), {
      filters: filtersFromEnv(env),
      logger,
    });

    console.log(formatReport(await duplicator.runPass(), opts.format));
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = err instanceof ConfigError ? 2 : 1;
});
