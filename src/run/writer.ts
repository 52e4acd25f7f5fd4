/**
 * Run Writer
 * Saves scan results to the output directory
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import type { ScoringRun } from '@/scoring/engine';
import { selectTopK } from '@/scoring/topk';
import { buildNarrativeContext, type NarrativeContext, type RunSummary } from './summary';

const logger = createChildLogger('run_writer');

export interface ScanRecord {
  metadata: ScoringRun['metadata'];
  summary: RunSummary;
  top: NarrativeContext[];
  ranked: ScoringRun['ranked'];
  rejected: Array<{ symbol: string; code: string; message: string }>;
}

export interface WriteResult {
  filePath: string;
  topCount: number;
}

export function buildScanRecord(run: ScoringRun, topN: number): ScanRecord {
  return {
    metadata: run.metadata,
    summary: run.summary,
    top: selectTopK(run.ranked, topN).map(buildNarrativeContext),
    ranked: run.ranked,
    rejected: run.rejected.map((result) => ({
      symbol: result.symbol,
      code: result.rejection?.code ?? 'internal_error',
      message: result.rejection?.message ?? '',
    })),
  };
}

/** File name from the run start, e.g. scan_2024-05-01T14-30-00.json */
export function scanFileName(startedAt: string): string {
  return `scan_${startedAt.replace(/\.\d+Z$/, '').replace(/:/g, '-')}.json`;
}

export function writeScanRecord(run: ScoringRun, outputDir: string, topN: number): WriteResult {
  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }

  const record = buildScanRecord(run, topN);
  const filePath = join(outputDir, scanFileName(run.metadata.startedAt));
  writeFileSync(filePath, JSON.stringify(record, null, 2), 'utf-8');

  logger.info({ filePath, ranked: run.ranked.length }, 'Scan record written');

  return { filePath, topCount: record.top.length };
}
