/**
 * Transport error classes.
 *
 * - GitHubApiError: the API answered with a structured error body. Callers
 *   may inspect it and turn it into a data-level outcome (see blocks/).
 * - TransportError: nothing usable came back (network failure, non-JSON
 *   body, unexpected shape). Always a hard failure.
 */

import type { ZodError } from 'zod';

/** One entry of the `errors` list GitHub attaches to validation failures. */
export interface GitHubFieldError {
  resource?: string;
  field?: string;
  code?: string;
  message?: string;
}

export interface GitHubApiErrorOptions {
  status: number;
  message: string;
  errors?: GitHubFieldError[];
  documentationUrl?: string;
}

export class GitHubApiError extends Error {
  readonly status: number;
  /** Field-level detail. Absent for plain "Not Found"-style responses. */
  readonly errors?: GitHubFieldError[];
  readonly documentationUrl?: string;

  constructor(options: GitHubApiErrorOptions) {
    super(options.message);
    this.name = 'GitHubApiError';
    this.status = options.status;
    this.errors = options.errors;
    this.documentationUrl = options.documentationUrl;
  }

  get hasFieldErrors(): boolean {
    return this.errors !== undefined;
  }
}

export class TransportError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
  }
}

/** A response arrived but did not match the shape we expect. */
export class MalformedResponseError extends TransportError {
  readonly issues: string[];

  constructor(what: string, error: ZodError) {
    const issues = error.issues.map((issue) => {
      const at = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${at}: ${issue.message}`;
    });
    super(`Malformed ${what}: ${issues.join('; ')}`, { cause: error });
    this.name = 'MalformedResponseError';
    this.issues = issues;
  }
}

export function isGitHubApiError(error: unknown): error is GitHubApiError {
  return error instanceof GitHubApiError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}
