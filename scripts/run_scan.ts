/**
 * Scan Script
 * Scores the ticker list and writes the ranked result to the output directory
 *
 * Usage: npx tsx scripts/run_scan.ts [--preset=<name>] [--tickers=<file>]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getConfig } from '../src/core/config';
import { getEnvConfig } from '../src/core/env';
import { ConfigurationError } from '../src/core/errors';
import { loadTickerFile } from '../src/core/tickers';
import { createMarketDataClient } from '../src/providers/registry';
import { runScoring } from '../src/scoring/engine';
import { loadScoringConfig } from '../src/scoring/scoring_config';
import { selectTopK } from '../src/scoring/topk';
import { writeScanRecord } from '../src/run/writer';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_scan');

function readArg(name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = process.argv.find((value) => value.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

async function main() {
  const startTime = Date.now();
  logger.info('Starting scan');

  try {
    const env = getEnvConfig();
    const appConfig = getConfig();

    const scoringConfig = loadScoringConfig({
      presetName: readArg('preset') ?? env.scoringPreset,
    });

    const tickersFile = readArg('tickers') ?? appConfig.tickersFile;
    const symbols = loadTickerFile(tickersFile);
    if (symbols.length === 0) {
      throw new ConfigurationError(`No tickers in ${tickersFile}`);
    }
    logger.info({ tickersFile, symbolCount: symbols.length, preset: scoringConfig.preset }, 'Tickers loaded');

    const client = createMarketDataClient(env, scoringConfig);

    // Ctrl-C stops the run the same way the run timeout does
    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.warn('Interrupted, finishing with partial results');
      controller.abort();
    });

    const run = await runScoring(symbols, {
      client,
      config: scoringConfig,
      signal: controller.signal,
    });

    logger.info(
      {
        ...run.summary,
        requestsMade: run.metadata.requestsMade,
        timedOut: run.metadata.timedOut,
      },
      'Scoring complete'
    );

    const writeResult = writeScanRecord(run, appConfig.outputDir, scoringConfig.pipeline.topN);

    const top = selectTopK(run.ranked, scoringConfig.pipeline.topN);
    console.log(`\nTop ${top.length} of ${run.summary.total}:`);
    top.forEach((result, index) => {
      const name = result.instrument?.companyName ?? '';
      console.log(
        `${String(index + 1).padStart(3)}. ${result.symbol.padEnd(6)} ${(result.weightedTotal ?? 0).toFixed(2)}  ${name}`
      );
    });
    console.log(`\nResults: ${writeResult.filePath}`);

    const duration = Date.now() - startTime;
    logger.info({ durationMs: duration }, 'Scan complete');
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error({ details: error.details }, error.message);
    } else {
      logger.error({ error }, 'Scan failed');
    }
    process.exit(1);
  }
}

main().catch(console.error);
