import fs from 'node:fs/promises';
import yargs from 'yargs';

import { loadConfig, type AppConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { errorMessage } from './errors.js';
import { formatDomainSet, parseHostsText, parseListText } from './domains/normalize.js';
import { runOnce, type RunDeps } from './run.js';
import { createRunTrigger, startScheduledRuns } from './scheduler.js';
import { buildApp } from './app.js';

export type CliIo = {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Overrides for the run pipeline, used by tests. */
  runDeps?: Omit<RunDeps, 'logger'>;
  /** Resolves when `serve` should shut down; defaults to SIGINT/SIGTERM. */
  shutdownSignal?: () => Promise<void>;
};

function loadConfigOrReport(io: CliIo): AppConfig | null {
  try {
    return loadConfig(io.env);
  } catch (e) {
    io.stderr(`${errorMessage(e)}\n`);
    return null;
  }
}

async function runCommand(io: CliIo, dryRun: boolean): Promise<number> {
  const config = loadConfigOrReport(io);
  if (!config) return 1;
  const log = createLogger(config);

  try {
    const report = await runOnce({ ...config, DRY_RUN: config.DRY_RUN || dryRun }, { ...io.runDeps, logger: log });
    const skipped = report.devices.filter((d) => d.status === 'connection-failed' || d.status === 'snapshot-failed');
    if (skipped.length) log.warn({ devices: skipped.map((d) => d.device) }, 'some gateways were skipped');
    return 0;
  } catch (e) {
    log.fatal({ err: errorMessage(e) }, 'run aborted');
    return 1;
  } finally {
    log.flush();
  }
}

function waitForSignal(log: Logger): Promise<void> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      log.info({ signal }, 'shutting down');
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

async function serveCommand(io: CliIo): Promise<number> {
  const config = loadConfigOrReport(io);
  if (!config) return 1;
  const log = createLogger(config);

  const runs = createRunTrigger(() => runOnce(config, { ...io.runDeps, logger: log }), log);
  const app = await buildApp(config, runs);
  const scheduler = startScheduledRuns(config, runs, log);

  try {
    await app.listen({ host: config.HOST, port: config.PORT });
    await (io.shutdownSignal ? io.shutdownSignal() : waitForSignal(log));
    return 0;
  } catch (e) {
    log.fatal({ err: errorMessage(e) }, 'server failed');
    return 1;
  } finally {
    await scheduler.close();
    await app.close();
    log.flush();
  }
}

async function normalizeCommand(io: CliIo, file: string, hosts: boolean): Promise<number> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (e) {
    io.stderr(`Cannot read ${file}: ${errorMessage(e)}\n`);
    return 1;
  }
  const domains = hosts ? parseHostsText(raw) : parseListText(raw);
  const text = formatDomainSet(domains);
  io.stdout(text ? `${text}\n` : '');
  return 0;
}

export async function main(argv: string[], io: CliIo): Promise<number> {
  let exitCode = 0;

  await yargs(argv)
    .scriptName('gateway-adblock')
    .command(
      ['run', '$0'],
      'Refresh blocklists if due and add redirect rules on every gateway',
      (y) => y.option('dry-run', { type: 'boolean', default: false, describe: 'Compute rules without writing them' }),
      async (args) => {
        exitCode = await runCommand(io, args['dry-run']);
      }
    )
    .command(
      'serve',
      'Run on a schedule and expose the status API',
      (y) => y,
      async () => {
        exitCode = await serveCommand(io);
      }
    )
    .command(
      'normalize <file>',
      'Print the domains a local list file normalizes to',
      (y) =>
        y
          .positional('file', { type: 'string', demandOption: true })
          .option('hosts', { type: 'boolean', default: false, describe: 'Strip leading IPv4 addresses (hosts format)' }),
      async (args) => {
        exitCode = await normalizeCommand(io, args.file, args.hosts);
      }
    )
    .strict()
    .help()
    .exitProcess(false)
    .fail((msg, err) => {
      io.stderr(`${msg || errorMessage(err)}\n`);
      exitCode = 1;
    })
    .parseAsync();

  return exitCode;
}
