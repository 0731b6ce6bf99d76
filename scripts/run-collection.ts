/**
 * Drama Collector — Run Collection Script
 *
 * Runs a single collection job and waits for it to finish.
 * Designed to be called by hand or by an external cron job.
 *
 * Usage:
 *   npm run collect                              # Default count, configured sources
 *   npm run collect -- --count 20                # Request 20 records
 *   npm run collect -- --sources douban,mock     # Only these sources
 *   npm run collect -- --export                  # Export the accepted records
 *   npm run collect -- --dry-run                 # Keep records in memory only
 *
 * Cron Setup (every 6 hours):
 *   0 0,6,12,18 * * * cd /path/to/drama-collector && npm run collect -- --export >> /var/log/drama-collector.log 2>&1
 */

import 'dotenv/config';
import { logger } from '../src/lib/logger';
import { errorMessage } from '../src/lib/errors';
import { ConfigManager } from '../src/config';
import { MemoryRecordStore } from '../src/db/store';
import { createRuntime } from '../src/runtime';
import { systemClock } from '../src/lib/clock';
import type { JobSnapshot } from '../src/types';

// ============================================================
// CONFIGURATION
// ============================================================

interface CollectionOptions {
  count?: number;
  sources?: string[];
  export: boolean;
  dryRun: boolean;
}

function parseArgs(args: string[] = process.argv.slice(2)): CollectionOptions {
  const options: CollectionOptions = {
    export: false,
    dryRun: false,
  };

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (args[i] === '--count' && next) {
      const count = parseInt(next, 10);
      if (Number.isInteger(count) && count > 0) options.count = count;
      i++;
    } else if (args[i] === '--sources' && next) {
      options.sources = next.split(',').map(name => name.trim()).filter(Boolean);
      i++;
    } else if (args[i] === '--export') {
      options.export = true;
    } else if (args[i] === '--dry-run') {
      options.dryRun = true;
    }
  }

  return options;
}

function printSummary(job: JobSnapshot): void {
  console.log('\n' + '='.repeat(60));
  console.log('COLLECTION SUMMARY');
  console.log('='.repeat(60));
  console.log(`Job:        ${job.id}`);
  console.log(`State:      ${job.state}${job.cancelled ? ' (cancelled)' : ''}`);
  console.log(`Collected:  ${job.counters.totalCollected}`);
  console.log(`Processed:  ${job.counters.totalProcessed} (dropped ${job.droppedRecords})`);
  console.log(`Stored:     ${job.counters.totalStored}`);

  if (job.exports.length > 0) {
    console.log('\nExports:');
    for (const file of job.exports) {
      console.log(`  ${file.format.padEnd(8)} ${file.path} (${file.size} bytes)`);
    }
  }

  if (job.errors.length > 0) {
    console.log('\nErrors:');
    for (const error of job.errors) {
      console.log(`  [${error.source}] ${error.message}`);
    }
  }
  console.log('='.repeat(60) + '\n');
}

// ============================================================
// MAIN
// ============================================================

async function runCollection(): Promise<void> {
  const options = parseArgs();
  const config = new ConfigManager().get();

  const requestedCount = options.count ?? config.scheduler.defaultCount;

  console.log('\n' + '='.repeat(60));
  console.log(config.appName.toUpperCase());
  console.log('='.repeat(60));
  console.log(`Requested:  ${requestedCount}`);
  console.log(`Sources:    ${(options.sources ?? Object.keys(config.sources)).join(', ')}`);
  console.log(`Export:     ${options.export}`);
  console.log(`Dry Run:    ${options.dryRun}`);
  console.log('='.repeat(60) + '\n');

  const runtime = createRuntime(config, {
    store: options.dryRun ? new MemoryRecordStore(systemClock) : undefined,
  });

  const jobId = runtime.orchestrator.start({
    trigger: 'manual',
    requestedCount,
    exportEnabled: options.export,
    sources: options.sources,
  });

  const stop = () => {
    logger.warn('Interrupted, cancelling job', { jobId });
    runtime.orchestrator.stop(jobId);
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const job = await runtime.orchestrator.whenSettled(jobId);
  if (!job) {
    console.error(`Job ${jobId} disappeared from history`);
    process.exit(1);
  }

  printSummary(job);
  process.exit(job.state === 'completed' ? 0 : 1);
}

runCollection().catch((error: unknown) => {
  console.error('Collection failed:', errorMessage(error));
  process.exit(1);
});
