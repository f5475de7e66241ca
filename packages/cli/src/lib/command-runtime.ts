import chalk from 'chalk';
import { isGitHubApiError, isTransportError } from '@octoblock/core';

interface ExitCommandErrorOptions {
  message: string;
  exitCode?: number;
  /** Extra lines printed under the message. */
  humanDetails?: string[];
}

export class CommandRuntimeError extends Error {
  readonly exitCode: number;
  readonly humanDetails?: string[];

  constructor(options: ExitCommandErrorOptions) {
    super(options.message);
    this.name = 'CommandRuntimeError';
    this.exitCode = options.exitCode ?? 1;
    this.humanDetails = options.humanDetails;
  }
}

export function isCommandRuntimeError(error: unknown): error is CommandRuntimeError {
  return error instanceof CommandRuntimeError;
}

export function renderCommandRuntimeError(error: CommandRuntimeError, writer: (line: string) => void = console.error): void {
  writer(chalk.red(`✗ ${error.message}`));

  for (const detail of error.humanDetails ?? []) {
    writer(detail);
  }
}

export function exitCommandError(options: ExitCommandErrorOptions): never {
  throw new CommandRuntimeError(options);
}

/**
 * Wrap any failure that escaped a command into a CommandRuntimeError so the
 * entry point has a single rendering path.
 */
export function toCommandRuntimeError(error: unknown): CommandRuntimeError {
  if (isCommandRuntimeError(error)) {
    return error;
  }

  if (isGitHubApiError(error)) {
    const details = (error.errors ?? []).map((e) =>
      `  ${[e.resource, e.field, e.code].filter(Boolean).join('.')}${e.message ? `: ${e.message}` : ''}`,
    );
    return new CommandRuntimeError({
      message: `GitHub API error (HTTP ${error.status}): ${error.message}`,
      humanDetails: details,
    });
  }

  if (isTransportError(error)) {
    return new CommandRuntimeError({ message: `Request failed: ${error.message}` });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CommandRuntimeError({ message });
}
