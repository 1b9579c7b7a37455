#!/usr/bin/env tsx

/**
 * Runner for the cleaning & validation pipeline
 * Loads environment variables, applies CLI overrides and writes the output artifacts
 *
 * Usage: tsx scripts/run-pipeline.ts [--input <file.json>] [--output <dir>]
 */

import dotenv from 'dotenv';
import path from 'path';

const projectRoot = path.resolve(__dirname, '..');

// Try to load .env.local first, then .env from project root
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { loadEnvironmentConfig } from '../src/config/environment';
import { runPipeline } from '../src/pipeline/runPipeline';
import { logger } from '../src/utils/logger';

function readFlag(args: string[], flag: string): string | undefined {
  const position = args.indexOf(flag);
  if (position === -1) return undefined;
  return args[position + 1];
}

async function main() {
  const args = process.argv.slice(2);
  const inputOverride = readFlag(args, '--input');
  const outputOverride = readFlag(args, '--output');

  try {
    const config = loadEnvironmentConfig({
      ...process.env,
      ...(inputOverride ? { PIPELINE_INPUT_PATH: inputOverride } : {}),
      ...(outputOverride ? { PIPELINE_OUTPUT_DIR: outputOverride } : {})
    });
    logger.setLevel(config.logging.level);

    console.log('🧹 Starting News Record Cleaning & Validation\n');
    console.log('═'.repeat(80));

    const result = await runPipeline({
      inputPath: config.pipeline.inputPath,
      outputDir: config.pipeline.outputDir,
      cleaner: config.cleaning,
      validator: config.validation
    });

    console.log('\n' + '═'.repeat(80));
    console.log('📊 Final Results:');
    console.log(`   • Total records: ${result.summary.total}`);
    console.log(`   • Valid: ${result.summary.valid}`);
    console.log(`   • Invalid: ${result.summary.invalid}`);
    console.log(`   • Duration: ${result.duration}ms`);
    console.log('\n📁 Outputs:');
    console.log(`   • ${result.outputs.validPath}`);
    console.log(`   • ${result.outputs.invalidPath}`);
    console.log(`   • ${result.outputs.reportPath}`);

    process.exit(0);
  } catch (error) {
    console.error('\n💥 PIPELINE FAILED');
    console.error('═'.repeat(80));
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

void main();
