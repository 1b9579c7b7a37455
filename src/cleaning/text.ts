/**
 * Text normalization for scraped news fields
 * Each step is exported on its own so it can be tested in isolation;
 * normalizeText applies them in pipeline order.
 */

import { decodeHTML } from 'entities';

const TAG_PATTERN = /<[^>]+>/g;

const TYPOGRAPHIC_REPLACEMENTS: ReadonlyArray<readonly [RegExp, string]> = [
  [/[\u2018\u2019]/g, "'"],
  [/[\u201C\u201D]/g, '"'],
  [/[\u2013\u2014]/g, '-'],
  [/\u00A0/g, ' ']
];

// C0/C1 controls except \t \n \v \f \r, plus the replacement character
const CONTROL_CHARACTERS = /[\u0000-\u0008\u000E-\u001F\u007F-\u009F\uFFFD]/g;

/**
 * Decode HTML entities, then drop tag-shaped substrings.
 * Decoding first means `&lt;b&gt;` is removed as markup rather than kept as literal text.
 */
export function stripMarkup(text: string): string {
  return decodeHTML(text).replace(TAG_PATTERN, '');
}

export function normalizeUnicode(text: string): string {
  return text.normalize('NFC');
}

/**
 * Smart quotes, en/em dashes and non-breaking spaces to plain ASCII
 */
export function replaceTypography(text: string): string {
  return TYPOGRAPHIC_REPLACEMENTS.reduce(
    (result, [pattern, replacement]) => result.replace(pattern, replacement),
    text
  );
}

export function removeControlCharacters(text: string): string {
  return text.replace(CONTROL_CHARACTERS, '');
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function normalizeOnce(text: string): string {
  let result = stripMarkup(text);
  result = normalizeUnicode(result);
  result = replaceTypography(result);
  result = removeControlCharacters(result);
  return collapseWhitespace(result);
}

/**
 * Full text cleaning pipeline.
 * Passes repeat until the value is stable so that cleaning already-clean text is a no-op
 * (each level of `&amp;amp;...` nesting needs one more pass).
 * A pass that changes the text only decodes or drops characters, so the loop ends.
 */
export function normalizeText(text: string): string {
  let current = normalizeOnce(text);
  let next = normalizeOnce(current);
  while (next !== current) {
    current = next;
    next = normalizeOnce(current);
  }
  return current;
}
