import type { ZodError } from 'zod';

/**
 * Raised when the input batch is not a sequence of flat records.
 * Data-quality problems inside a well-shaped record are never raised; they become validation reasons.
 */
export class PipelineInputError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'PipelineInputError';
    this.issues = issues;
  }
}

/**
 * Raised for caller mistakes in cleaner/validator options or environment configuration
 */
export class PipelineConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineConfigError';
  }
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
