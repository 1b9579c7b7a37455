import { NewsRecord, fieldText } from '../types/record';
import { ValidationReason, reasonCode } from './reasons';

export interface InvalidRecord {
  index: number;              // Position in the validator's input
  record: NewsRecord;
  reasons: ValidationReason[];
}

export interface FieldCompleteness {
  field: string;
  percent: number;            // 0-100, two decimals
}

export interface ReasonFrequency {
  code: string;
  count: number;
}

export interface QualitySummary {
  total: number;
  valid: number;
  invalid: number;
  completeness: FieldCompleteness[];
  reasonFrequencies: ReasonFrequency[];
}

function roundPercent(value: number): number {
  return Math.round(value * 100) / 100;
}

function compareFrequencies(a: ReasonFrequency, b: ReasonFrequency): number {
  if (a.count !== b.count) {
    return b.count - a.count;
  }
  if (a.code === b.code) return 0;
  return a.code < b.code ? -1 : 1;
}

/**
 * Share of valid records with a non-blank value, per field
 */
export function computeCompleteness(valid: readonly NewsRecord[], fields: readonly string[]): FieldCompleteness[] {
  return fields.map(field => {
    if (valid.length === 0) {
      return { field, percent: 0 };
    }
    const filled = valid.filter(record => fieldText(record[field]) !== '').length;
    return { field, percent: roundPercent((filled / valid.length) * 100) };
  });
}

export function countReasons(invalid: readonly InvalidRecord[]): ReasonFrequency[] {
  const counts = new Map<string, number>();
  for (const { reasons } of invalid) {
    for (const reason of reasons) {
      const code = reasonCode(reason);
      counts.set(code, (counts.get(code) || 0) + 1);
    }
  }

  return Array.from(counts, ([code, count]) => ({ code, count })).sort(compareFrequencies);
}

export function buildQualitySummary(
  valid: readonly NewsRecord[],
  invalid: readonly InvalidRecord[],
  reportFields: readonly string[]
): QualitySummary {
  return {
    total: valid.length + invalid.length,
    valid: valid.length,
    invalid: invalid.length,
    completeness: computeCompleteness(valid, reportFields),
    reasonFrequencies: countReasons(invalid)
  };
}
