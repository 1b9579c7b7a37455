/**
 * Environment configuration for the pipeline runner
 * Loads and validates pipeline settings from environment variables
 */

import { PipelineConfigError } from '../utils/errors';
import { LogLevel, isLogLevel } from '../utils/logger';
import { DEFAULT_CONTENT_MIN_LENGTH, DEFAULT_REQUIRED_FIELDS } from '../validation/validator';

export interface EnvironmentConfig {
  pipeline: {
    inputPath: string;
    outputDir: string;
  };
  cleaning: {
    textFields: string[];
    dateFields: string[];
  };
  validation: {
    requiredFields: string[];
    contentMinLength: number;
  };
  logging: {
    level: LogLevel;
  };
}

export const DEFAULT_TEXT_FIELDS = ['heading', 'title', 'content', 'description', 'url', 'link', 'guid'];

export const DEFAULT_DATE_FIELDS = ['pubDate'];

type Env = Record<string, string | undefined>;

function parseFieldList(name: string, raw: string | undefined, fallback: readonly string[]): string[] {
  if (raw === undefined) {
    return [...fallback];
  }
  const fields = raw
    .split(',')
    .map(field => field.trim())
    .filter(field => field.length > 0);
  if (fields.length === 0) {
    throw new PipelineConfigError(`${name} must list at least one field name`);
  }
  return fields;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new PipelineConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value <= 0) {
    throw new PipelineConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Load and validate environment configuration
 * @throws PipelineConfigError if a required variable is missing or a value is malformed
 */
export function loadEnvironmentConfig(env: Env = process.env): EnvironmentConfig {
  const inputPath = env.PIPELINE_INPUT_PATH;
  if (!inputPath) {
    throw new PipelineConfigError('Missing required environment variables: PIPELINE_INPUT_PATH');
  }

  const logLevel = env.LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new PipelineConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  return {
    pipeline: {
      inputPath,
      outputDir: env.PIPELINE_OUTPUT_DIR || 'output'
    },
    cleaning: {
      textFields: parseFieldList('PIPELINE_TEXT_FIELDS', env.PIPELINE_TEXT_FIELDS, DEFAULT_TEXT_FIELDS),
      dateFields: parseFieldList('PIPELINE_DATE_FIELDS', env.PIPELINE_DATE_FIELDS, DEFAULT_DATE_FIELDS)
    },
    validation: {
      requiredFields: parseFieldList('PIPELINE_REQUIRED_FIELDS', env.PIPELINE_REQUIRED_FIELDS, DEFAULT_REQUIRED_FIELDS),
      contentMinLength: parsePositiveInt('PIPELINE_CONTENT_MIN_LENGTH', env.PIPELINE_CONTENT_MIN_LENGTH, DEFAULT_CONTENT_MIN_LENGTH)
    },
    logging: {
      level: logLevel
    }
  };
}
