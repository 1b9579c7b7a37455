/**
 * Record Cleaner
 * Pure transformation: records in, new records out, same length and order, nothing rejected.
 */

import { z } from 'zod';
import { FieldValue, NewsRecord, isIterable, newsRecordSchema } from '../types/record';
import { PipelineConfigError, PipelineInputError, formatZodIssues } from '../utils/errors';
import { standardizeDate } from './dates';
import { normalizeText } from './text';

export interface CleanerOptions {
  textFields: ReadonlyArray<string> | ReadonlySet<string>;
  dateFields: ReadonlyArray<string> | ReadonlySet<string>;
}

interface FieldClassification {
  textFields: ReadonlySet<string>;
  dateFields: ReadonlySet<string>;
}

const fieldNameSchema = z.string().min(1, 'field names must be non-empty');

const fieldSetSchema = z.union([z.array(fieldNameSchema), z.set(fieldNameSchema)]);

const cleanerOptionsSchema = z.object({
  textFields: fieldSetSchema,
  dateFields: fieldSetSchema
});

function resolveOptions(options: CleanerOptions): FieldClassification {
  const result = cleanerOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new PipelineConfigError(`Invalid cleaner options: ${formatZodIssues(result.error).join('; ')}`);
  }
  return {
    textFields: new Set(result.data.textFields),
    dateFields: new Set(result.data.dateFields)
  };
}

function cleanField(key: string, value: FieldValue | undefined, fields: FieldClassification): FieldValue | undefined {
  if (typeof value !== 'string' || value === '') {
    return value;
  }
  // Date fields take precedence when a field is listed in both sets
  if (fields.dateFields.has(key)) {
    return standardizeDate(value);
  }
  if (fields.textFields.has(key)) {
    return normalizeText(value);
  }
  return value;
}

/**
 * Clean a single record. Fields outside both sets are copied verbatim.
 */
export function cleanRecord(record: NewsRecord, fields: FieldClassification): NewsRecord {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [key, cleanField(key, value, fields)])
  );
}

/**
 * Lazily clean a sequence of records one at a time.
 * @throws PipelineInputError when the input is not a sequence of flat records
 * @throws PipelineConfigError when the field options are malformed
 */
export function* iterateCleanedRecords(records: Iterable<unknown>, options: CleanerOptions): Generator<NewsRecord> {
  const fields = resolveOptions(options);
  if (!isIterable(records)) {
    throw new PipelineInputError('Cleaner input must be a sequence of records');
  }

  let index = 0;
  for (const raw of records) {
    const parsed = newsRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PipelineInputError(`Record ${index} is not a flat record`, formatZodIssues(parsed.error));
    }
    yield cleanRecord(parsed.data, fields);
    index++;
  }
}

export function cleanRecords(records: Iterable<unknown>, options: CleanerOptions): NewsRecord[] {
  return Array.from(iterateCleanedRecords(records, options));
}
