#!/usr/bin/env node

import { readFileSync } from 'fs';
import { Config, VehicleModel } from './types/index.js';
import { createSupabaseClient } from './database/client.js';
import { SnapshotStore, SupabaseSnapshotStore } from './database/snapshot-store.js';
import { InMemorySnapshotStore } from './database/in-memory-snapshot-store.js';
import { PageClient } from './scraper/page-client.js';
import { ScrapeRunner, RunOptions } from './runner/scrape-runner.js';
import { buildStatistics } from './reporting/vehicle-analyzer.js';
import { exportModelCsv } from './reporting/csv-export.js';
import { writeMultiModelSummary } from './reporting/summary.js';
import { JobScheduler } from './scheduler/scheduler.js';
import { startServer } from './server.js';
import { CliArgs, parseCliArgs, parseModelsCsv } from './utils/cli-args.js';
import { loadConfig } from './utils/config.js';
import { enableFileLogging, logger, setLogLevel } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

/**
 * Usage:
 *   npm run scrape -- --make=bmw --model=3-series --pages=5
 *   npm run scrape:multi -- --models-file=models.csv
 *   npm start -- --mode=stats --make=bmw --model=3-series
 *   npm run schedule -- --schedule="0 8 * * *" --run-now
 */

function createStore(config: Config, dryRun: boolean): SnapshotStore {
  if (dryRun) {
    logger.warn('Dry run: results are kept in memory and discarded on exit');
    return new InMemorySnapshotStore();
  }
  return new SupabaseSnapshotStore(createSupabaseClient(config));
}

function createRunner(config: Config, store: SnapshotStore): ScrapeRunner {
  return new ScrapeRunner({
    store,
    fetcher: new PageClient({ timeoutMs: config.site.requestTimeoutMs }),
    baseUrl: config.site.baseUrl,
    maxAutoPages: config.site.maxAutoPages,
    scraperVersion: config.app.scraperVersion,
  });
}

function runOptions(args: CliArgs): RunOptions {
  return {
    maxPages: args.pages,
    delaySeconds: args.delay,
    stopOnEmpty: args.stopOnEmpty,
    adaptiveDelay: args.adaptiveDelay,
    exportDir: args.exportDir,
  };
}

function loadModels(path: string): VehicleModel[] {
  const models = parseModelsCsv(readFileSync(path, 'utf-8'));
  if (models.length === 0) {
    throw new Error(`No models found in ${path}`);
  }
  return models;
}

/**
 * Scrape every model of the models file and write the summary report
 */
async function runMultiModelJob(config: Config, store: SnapshotStore, args: CliArgs): Promise<number> {
  const models = loadModels(args.modelsFile || config.app.modelsFile);
  const result = await createRunner(config, store).runMultiModel(models, runOptions(args));

  console.log('\n=== Summary ===\n');
  for (const run of result.results) {
    const status = run.status === 'success' ? 'OK' : run.status === 'skipped' ? 'SKIPPED' : 'ERROR';
    const detail =
      run.status === 'error'
        ? run.error
        : `${run.totalListings} listings, ${run.inserted} new, ${run.priceChanges} price changes`;
    console.log(`  [${status}] ${run.make} ${run.model}: ${detail}`);
  }
  console.log(`\nSucceeded: ${result.succeeded}, skipped: ${result.skipped}, failed: ${result.failed}`);

  const summaryFile = await writeMultiModelSummary(store, config.app.dataDir, config.app.scraperVersion);
  console.log(`Summary written to ${summaryFile}`);

  return result.failed;
}

async function showStats(store: SnapshotStore, args: CliArgs): Promise<void> {
  const filter = { make: args.make, model: args.model };
  const [listings, history] = await Promise.all([
    store.listAllActiveListings(filter),
    store.listAllPriceHistory(filter),
  ]);
  const stats = buildStatistics(listings, history);
  const euro = (value: number | null) => (value === null ? '-' : `${Math.round(value).toLocaleString('en-US')} EUR`);

  console.log(`\nStatistics for ${args.make} ${args.model}:`);
  console.log('Listings:');
  console.log(`  Total: ${stats.listings.total_listings}`);
  console.log(`  Average price: ${euro(stats.listings.avg_price)}`);
  console.log(`  Price range: ${euro(stats.listings.min_price)} - ${euro(stats.listings.max_price)}`);
  console.log(`  Average mileage: ${stats.listings.avg_mileage ?? '-'} km`);
  console.log('Price changes:');
  console.log(`  Total: ${stats.price_changes.total_changes}`);
  console.log(`  Drops: ${stats.price_changes.price_drops}`);
  console.log(`  Increases: ${stats.price_changes.price_increases}`);

  if (Object.keys(stats.fuel_types).length > 0) {
    console.log('Fuel types:');
    for (const [fuel, count] of Object.entries(stats.fuel_types)) {
      console.log(`  ${fuel}: ${count}`);
    }
  }
}

/**
 * Run one CLI command; resolves to the process exit code.
 * Long-running modes (serve, schedule) resolve once started.
 */
async function main(argv: string[]): Promise<number> {
  const args = parseCliArgs(argv);
  const config = loadConfig(process.env, { requireSupabase: !args.dryRun });
  const dataDir = args.dataDir || config.app.dataDir;
  const runConfig: Config = { ...config, app: { ...config.app, dataDir } };

  setLogLevel(config.app.logLevel);
  if (args.mode === 'scrape' || args.mode === 'multi' || args.mode === 'schedule') {
    enableFileLogging(dataDir);
  }

  const store = createStore(runConfig, args.dryRun);

  switch (args.mode) {
    case 'scrape': {
      const result = await createRunner(runConfig, store).runScrape(args.make, args.model, runOptions(args));
      console.log(`\n${args.make} ${args.model}: ${result.status}`);
      console.log(`  Listings: ${result.totalListings} (${result.inserted} new, ${result.updated} updated)`);
      console.log(`  Deactivated: ${result.deactivated}, price changes: ${result.priceChanges}`);
      if (result.error) {
        console.log(`  Error: ${result.error}`);
      }
      return result.status === 'error' ? 1 : 0;
    }

    case 'multi':
      return (await runMultiModelJob(runConfig, store, args)) > 0 ? 1 : 0;

    case 'list-models': {
      const models = await store.listModels();
      console.log('\nTracked models:');
      for (const { make, model, count } of models) {
        console.log(`  ${make} ${model} (${count} active)`);
      }
      if (models.length === 0) {
        console.log('  No models found.');
      }
      return 0;
    }

    case 'stats':
      await showStats(store, args);
      return 0;

    case 'export': {
      const files = await exportModelCsv(store, args.make, args.model, args.exportDir || dataDir);
      console.log(`Listings: ${files.listingsFile ?? 'nothing to export'}`);
      console.log(`Price history: ${files.priceHistoryFile ?? 'nothing to export'}`);
      return 0;
    }

    case 'summary': {
      const file = await writeMultiModelSummary(store, dataDir, config.app.scraperVersion);
      console.log(`Summary written to ${file}`);
      return 0;
    }

    case 'serve':
      startServer(store, config.app.apiPort);
      return 0;

    case 'schedule': {
      const scheduler = new JobScheduler(
        async () => {
          await runMultiModelJob(runConfig, store, args);
        },
        { schedule: args.schedule || config.app.schedule, runOnStart: args.runNow }
      );
      await scheduler.start();

      const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down gracefully`);
        scheduler.stop();
        process.exit(0);
      };
      process.on('SIGINT', () => shutdown('SIGINT'));
      process.on('SIGTERM', () => shutdown('SIGTERM'));
      return 0;
    }
  }
}

// Run if called directly
// Check if this is the main module (works with both node and tsx)
const isMainModule = process.argv[1]?.includes('index.ts') || process.argv[1]?.includes('index.js');

if (isMainModule) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.error('Command failed', { error: errorMessage(error) });
      process.exitCode = 1;
    });
}

export { main };
