// Why a record failed validation. One variant per rule, evaluated in this order.
export type ValidationReason =
  | { kind: 'missing_field'; field: string }
  | { kind: 'invalid_url'; field: string; value: string }
  | { kind: 'content_too_short'; field: string; length: number; minimum: number };

export type ReasonKind = ValidationReason['kind'];

/**
 * Stable code used in invalid-record output and frequency tables
 */
export function reasonCode(reason: ValidationReason): string {
  switch (reason.kind) {
    case 'missing_field':
      return `missing_field:${reason.field}`;
    case 'invalid_url':
      return 'invalid_url';
    case 'content_too_short':
      return 'content_too_short';
    default: {
      const unreachable: never = reason;
      return unreachable;
    }
  }
}

export function describeReason(reason: ValidationReason): string {
  switch (reason.kind) {
    case 'missing_field':
      return `missing required field: ${reason.field}`;
    case 'invalid_url':
      return `${reason.field}: not an absolute http(s) URL (${reason.value})`;
    case 'content_too_short':
      return `${reason.field}: too short (${reason.length} chars, minimum ${reason.minimum})`;
    default: {
      const unreachable: never = reason;
      return unreachable;
    }
  }
}
