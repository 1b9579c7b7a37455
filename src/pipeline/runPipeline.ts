/**
 * Pipeline runner
 * Owns file I/O and sequencing around the pure cleaner and validator:
 * 1. Loads the scraped batch from a JSON file
 * 2. Cleans every record
 * 3. Validates the cleaned records
 * 4. Writes clean records, invalid records with reasons, and the quality report
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { CleanerOptions, cleanRecords } from '../cleaning/cleaner';
import { renderQualityReport } from '../report/qualityReport';
import { PipelineInputError } from '../utils/errors';
import { logger } from '../utils/logger';
import { describeReason, reasonCode } from '../validation/reasons';
import { QualitySummary } from '../validation/summary';
import { ValidatorOptions, validateRecords } from '../validation/validator';

export const OUTPUT_FILES = {
  valid: 'clean_records.json',
  invalid: 'invalid_records.json',
  report: 'quality_report.txt'
} as const;

export interface PipelineConfig {
  inputPath: string;
  outputDir: string;
  cleaner: CleanerOptions;
  validator?: ValidatorOptions;
  reportTitle?: string;
  now?: () => Date;
}

export interface PipelineResult {
  summary: QualitySummary;
  outputs: {
    validPath: string;
    invalidPath: string;
    reportPath: string;
  };
  duration: number;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts a bare array of records, or a scraper envelope with an `items` or `records` array
 */
export function extractRecordArray(payload: unknown): unknown[] {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (isPlainObject(payload)) {
    for (const key of ['items', 'records']) {
      const candidate = payload[key];
      if (Array.isArray(candidate)) {
        return candidate;
      }
    }
  }
  throw new PipelineInputError('Input must be a JSON array of records or an object with an "items" or "records" array');
}

export async function loadRecords(inputPath: string): Promise<unknown[]> {
  const raw = await readFile(inputPath, 'utf-8');

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    throw new PipelineInputError(`Input file ${inputPath} is not valid JSON`, [reason]);
  }

  return extractRecordArray(payload);
}

async function writeJson(filePath: string, data: unknown): Promise<void> {
  await writeFile(filePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
}

export async function runPipeline(config: PipelineConfig): Promise<PipelineResult> {
  const now = config.now || (() => new Date());
  const startTime = Date.now();

  logger.info(`Loading records from ${config.inputPath}`);
  const rawRecords = await loadRecords(config.inputPath);
  logger.info(`Loaded ${rawRecords.length} records`);

  const cleaned = cleanRecords(rawRecords, config.cleaner);
  logger.debug(`Cleaned ${cleaned.length} records`);

  const { valid, invalid, summary } = validateRecords(cleaned, config.validator);
  logger.info(`Validation complete: ${summary.valid} valid, ${summary.invalid} invalid`);
  if (summary.total > 0 && summary.valid === 0) {
    logger.warn('No records passed validation', { reasons: summary.reasonFrequencies });
  }

  await mkdir(config.outputDir, { recursive: true });

  const outputs = {
    validPath: path.join(config.outputDir, OUTPUT_FILES.valid),
    invalidPath: path.join(config.outputDir, OUTPUT_FILES.invalid),
    reportPath: path.join(config.outputDir, OUTPUT_FILES.report)
  };

  await writeJson(outputs.validPath, valid);
  await writeJson(
    outputs.invalidPath,
    invalid.map(({ index, record, reasons }) => ({
      index,
      record,
      reasons: reasons.map(reasonCode),
      messages: reasons.map(describeReason)
    }))
  );
  await writeFile(
    outputs.reportPath,
    renderQualityReport(summary, { title: config.reportTitle, generatedAt: now() }),
    'utf-8'
  );

  const duration = Date.now() - startTime;
  logger.info(`Wrote outputs to ${config.outputDir} in ${duration}ms`);

  return { summary, outputs, duration };
}
