import { config } from 'dotenv';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';

const __dirname = dirname(fileURLToPath(import.meta.url));
const rootDir = resolve(__dirname, '../../..');

// Production takes its environment from the container
if (process.env.NODE_ENV !== 'production') {
  config({ path: resolve(rootDir, '.env.local') });
  config({ path: resolve(rootDir, '.env') });
}

import { createServiceLogger, generateTraceId, safeLogError } from '@collector/shared';
import {
  PgChangeHashStore,
  PgRecordSink,
  PgRunStore,
  closePool,
  getRun,
  insertErrorLog,
  listEntityOutcomes,
  listRuns,
} from '@collector/database';
import { loadBrands, loadConfig } from './config.js';
import { USAGE, UsageError, runCommand } from './commands.js';

// One trace id per invocation ties the run logs of a command together
const logger = createServiceLogger('collector').withContext({ traceId: generateTraceId() });
const shutdown = new AbortController();

function onSignal(signal: NodeJS.Signals): void {
  if (shutdown.signal.aborted) {
    logger.warn(`Received ${signal} again, exiting immediately`);
    process.exit(1);
  }
  logger.info(`Received ${signal}, shutting down`);
  shutdown.abort();
}

process.on('SIGTERM', onSignal);
process.on('SIGINT', onSignal);

async function main(): Promise<void> {
  try {
    const collectorConfig = loadConfig();
    process.exitCode = await runCommand(process.argv.slice(2), {
      config: collectorConfig,
      runs: new PgRunStore(),
      hashes: new PgChangeHashStore(),
      records: new PgRecordSink(),
      logger,
      loadBrands: () => loadBrands(collectorConfig.brandsPath, collectorConfig.alternateProfileBrands),
      reader: { listRuns: (limit) => listRuns(limit), getRun, listEntityOutcomes },
      print: (line) => console.log(line),
      signal: shutdown.signal,
    });
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.log(USAGE);
    } else {
      logger.error('Command failed', error);
      await safeLogError(insertErrorLog, 'collector', error, { argv: process.argv.slice(2).join(' ') }, logger);
    }
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

main().catch((error: unknown) => {
  logger.fatal('Collector crashed', error);
  process.exitCode = 1;
});
