/**
 * Record Validator
 * Partitions cleaned records into valid and invalid (with ordered reasons) and summarizes the pass.
 * Never mutates its input and never throws for data-quality problems.
 */

import { z } from 'zod';
import { NewsRecord, RECOGNIZED_FIELDS, isIterable, newsRecordSchema } from '../types/record';
import { PipelineConfigError, PipelineInputError, formatZodIssues } from '../utils/errors';
import { ValidationReason } from './reasons';
import { checkContentLength, checkRequiredFields, checkUrlFormat, resolveAliases } from './rules';
import { InvalidRecord, QualitySummary, buildQualitySummary } from './summary';

export const DEFAULT_REQUIRED_FIELDS: readonly string[] = ['heading', 'content', 'url'];

export const DEFAULT_FIELD_ALIASES: Readonly<Record<string, string>> = {
  heading: 'title',
  content: 'description',
  url: 'link'
};

export const DEFAULT_CONTENT_MIN_LENGTH = 20;

export interface ValidatorOptions {
  requiredFields?: readonly string[];
  fieldAliases?: Readonly<Record<string, string>>;
  contentMinLength?: number;
  urlField?: string;
  contentField?: string;
  reportFields?: readonly string[];
}

const fieldNameSchema = z.string().min(1, 'field names must be non-empty');

const validatorOptionsSchema = z.object({
  requiredFields: z
    .array(fieldNameSchema)
    .min(1, 'requiredFields must name at least one field')
    .default([...DEFAULT_REQUIRED_FIELDS]),
  fieldAliases: z.record(fieldNameSchema, fieldNameSchema).default({ ...DEFAULT_FIELD_ALIASES }),
  contentMinLength: z.number().int().positive().default(DEFAULT_CONTENT_MIN_LENGTH),
  urlField: fieldNameSchema.default('url'),
  contentField: fieldNameSchema.default('content'),
  reportFields: z.array(fieldNameSchema).default([...RECOGNIZED_FIELDS])
});

export type ResolvedValidatorOptions = z.infer<typeof validatorOptionsSchema>;

export interface RecordValidation {
  isValid: boolean;
  record: NewsRecord;           // Aliased values exposed under their canonical names
  reasons: ValidationReason[];
}

export interface ValidationResult {
  valid: NewsRecord[];
  invalid: InvalidRecord[];
  summary: QualitySummary;
}

/**
 * Apply defaults and check the validator configuration
 * @throws PipelineConfigError for an empty required-field list or other malformed options
 */
export function resolveValidatorOptions(options: ValidatorOptions = {}): ResolvedValidatorOptions {
  const result = validatorOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new PipelineConfigError(`Invalid validator options: ${formatZodIssues(result.error).join('; ')}`);
  }
  return result.data;
}

/**
 * Validate one record. Reasons come out in rule order:
 * missing required fields (in configured order), then URL format, then content length.
 */
export function validateRecord(record: NewsRecord, options: ResolvedValidatorOptions): RecordValidation {
  const resolved = resolveAliases(record, options.fieldAliases);

  const reasons: ValidationReason[] = checkRequiredFields(resolved, options.requiredFields);

  const urlReason = checkUrlFormat(resolved, options.urlField);
  if (urlReason) {
    reasons.push(urlReason);
  }

  const lengthReason = checkContentLength(resolved, options.contentField, options.contentMinLength);
  if (lengthReason) {
    reasons.push(lengthReason);
  }

  return { isValid: reasons.length === 0, record: resolved, reasons };
}

/**
 * Validate a batch. Both partitions keep the relative input order.
 * @throws PipelineInputError when the input is not a sequence of flat records
 */
export function validateRecords(records: Iterable<unknown>, options: ValidatorOptions = {}): ValidationResult {
  const resolvedOptions = resolveValidatorOptions(options);
  if (!isIterable(records)) {
    throw new PipelineInputError('Validator input must be a sequence of records');
  }

  const valid: NewsRecord[] = [];
  const invalid: InvalidRecord[] = [];

  let index = 0;
  for (const raw of records) {
    const parsed = newsRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PipelineInputError(`Record ${index} is not a flat record`, formatZodIssues(parsed.error));
    }

    const { isValid, record, reasons } = validateRecord(parsed.data, resolvedOptions);
    if (isValid) {
      valid.push(record);
    } else {
      invalid.push({ index, record, reasons });
    }
    index++;
  }

  return {
    valid,
    invalid,
    summary: buildQualitySummary(valid, invalid, resolvedOptions.reportFields)
  };
}
