import { z } from 'zod';

// Scalar values a scraped record may carry (matches the flat JSON the scrapers emit)
export type FieldValue = string | number | boolean | null;

export interface NewsRecord {
  readonly [field: string]: FieldValue | undefined;
}

export const RECOGNIZED_FIELDS = ['heading', 'content', 'url', 'pubDate', 'guid'] as const;

const fieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// undefined stands for an absent field when records are built in code rather than parsed from JSON
export const newsRecordSchema = z.record(fieldValueSchema.optional());

/**
 * Returns the trimmed text of a field, or '' when the field is absent or null.
 */
export function fieldText(value: FieldValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  return String(value).trim();
}

// Strings are iterable but never a record sequence
export function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}
