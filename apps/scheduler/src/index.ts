// Only load dotenv in development - production uses container env vars
if (process.env.NODE_ENV !== 'production') {
  const { config } = await import('dotenv');
  const { fileURLToPath } = await import('node:url');
  const { dirname, resolve } = await import('node:path');

  const __dirname = dirname(fileURLToPath(import.meta.url));
  const rootDir = resolve(__dirname, '../../..');

  config({ path: resolve(rootDir, '.env.local') });
  config({ path: resolve(rootDir, '.env') });
}

import { CycleCancelledError, createLogger, safeLogError } from '@deltaflow/shared';
import {
  applySchema,
  closePool,
  getLatestCycleReport,
  insertCycleReport,
  insertErrorLog,
} from '@deltaflow/database';
import { createBackends } from './backends.js';
import { loadConfig } from './config.js';
import { runScheduledCycle } from './cycle.js';
import { notifyCycleReport, reportExitCode, summarizeReport } from './report.js';

const logger = createLogger({ service: 'scheduler' });

function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

async function runCommand(): Promise<void> {
  const config = loadConfig();
  const backends = createBackends(config, logger);

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn('Shutdown requested, cancelling cycle', { signal });
    controller.abort(new CycleCancelledError(`Cycle cancelled by ${signal}`));
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const report = await runScheduledCycle(config, backends, {
      logger,
      signal: controller.signal,
      persist: insertCycleReport,
    });

    logger.info('Cycle report', { cycleId: report.cycleId, summary: summarizeReport(report) });
    printJson(report);
    await notifyCycleReport(report);
    process.exitCode = reportExitCode(report);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await backends.close();
  }
}

async function lastCommand(): Promise<void> {
  const report = await getLatestCycleReport();
  if (!report) {
    logger.info('No cycle has been recorded yet');
    process.exitCode = 1;
    return;
  }
  printJson(report);
}

async function migrateCommand(): Promise<void> {
  await applySchema();
  logger.info('State schema applied');
}

async function main(): Promise<void> {
  const command = process.argv[2] ?? 'run';
  try {
    switch (command) {
      case 'run':
        await runCommand();
        break;
      case 'last':
        await lastCommand();
        break;
      case 'migrate':
        await migrateCommand();
        break;
      default:
        logger.error(`Unknown command '${command}', expected run, last or migrate`);
        process.exitCode = 2;
    }
  } catch (error) {
    logger.fatal('Scheduler failed', error, { command });
    // Also posts to the errors channel
    safeLogError(insertErrorLog, 'scheduler', error, { command }, logger);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

await main();
