/**
 * Config error types
 */

import type { ZodError } from 'zod';

export type FormatConfigErrorCode = 'INVALID_CONFIG';

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Raised when formatter settings fail validation.
 */
export class FormatConfigError extends Error {
  public readonly code: FormatConfigErrorCode;

  /** One entry per failed field, keyed by dot path */
  public readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[]) {
    super(message);
    this.name = 'FormatConfigError';
    this.code = 'INVALID_CONFIG';
    this.issues = issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FormatConfigError);
    }
  }

  static fromZod(error: ZodError): FormatConfigError {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    }));
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    return new FormatConfigError(`Invalid formatter configuration: ${summary}`, issues);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      issues: this.issues,
    };
  }
}

export function isFormatConfigError(error: unknown): error is FormatConfigError {
  return error instanceof FormatConfigError;
}
