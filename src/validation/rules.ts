/**
 * Individual validation rules.
 * Each rule reads canonical field names; alias resolution happens before the rules run.
 */

import { NewsRecord, fieldText } from '../types/record';
import { ValidationReason } from './reasons';

/**
 * Copy of the record with each blank canonical field filled from its alias
 */
export function resolveAliases(record: NewsRecord, fieldAliases: Readonly<Record<string, string>>): NewsRecord {
  const resolved: Record<string, NewsRecord[string]> = { ...record };

  for (const [canonical, alias] of Object.entries(fieldAliases)) {
    if (fieldText(record[canonical]) === '' && fieldText(record[alias]) !== '') {
      resolved[canonical] = record[alias];
    }
  }

  return resolved;
}

export function checkRequiredFields(record: NewsRecord, requiredFields: readonly string[]): ValidationReason[] {
  return requiredFields
    .filter(field => fieldText(record[field]) === '')
    .map((field): ValidationReason => ({ kind: 'missing_field', field }));
}

// WHATWG URL parsing repairs `http:example.com` into a full URL, so the authority is checked on the raw text
const ABSOLUTE_HTTP_PREFIX = /^https?:\/\/[^\s/?#]+/i;

export function isHttpUrl(value: string): boolean {
  if (!ABSOLUTE_HTTP_PREFIX.test(value)) {
    return false;
  }

  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch (error) {
    return false;
  }
  return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname !== '';
}

/**
 * Absent URLs are the required-field rule's concern, not this one
 */
export function checkUrlFormat(record: NewsRecord, urlField: string): ValidationReason | null {
  const url = fieldText(record[urlField]);
  if (url === '' || isHttpUrl(url)) {
    return null;
  }
  return { kind: 'invalid_url', field: urlField, value: url };
}

export function checkContentLength(record: NewsRecord, contentField: string, minimum: number): ValidationReason | null {
  const content = fieldText(record[contentField]);
  if (content === '') {
    return null;
  }

  // Count code points so an emoji or astral character counts once
  const length = Array.from(content).length;
  if (length < minimum) {
    return { kind: 'content_too_short', field: contentField, length, minimum };
  }
  return null;
}
