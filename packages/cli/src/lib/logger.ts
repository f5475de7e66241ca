/**
 * Logger implementation for CLI
 */

import chalk from 'chalk';
import type { Logger } from '@octoblock/core';

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** Custom output function; routes all log output through this instead of stderr. */
  output?: (msg: string) => void;
}

/**
 * Create a logger instance. Everything goes to stderr: stdout is reserved
 * for CSV records.
 */
export function createLogger(opts: LoggerOptions = {}): Logger {
  const { verbose = false, quiet = false, output } = opts;
  const write = output ?? ((msg: string) => console.error(msg));

  return {
    debug(msg: string, data?: Record<string, unknown>) {
      if (verbose && !quiet) {
        const dataStr = data ? ` ${JSON.stringify(data)}` : '';
        write(chalk.gray(`[debug] ${msg}${dataStr}`));
      }
    },

    info(msg: string, data?: Record<string, unknown>) {
      if (!quiet) {
        const dataStr = data && verbose ? ` ${JSON.stringify(data)}` : '';
        write(chalk.blue(`[info] ${msg}${dataStr}`));
      }
    },

    warn(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      write(chalk.yellow(`[warn] ${msg}${dataStr}`));
    },

    error(msg: string, data?: Record<string, unknown>) {
      const dataStr = data ? ` ${JSON.stringify(data)}` : '';
      write(chalk.red(`[error] ${msg}${dataStr}`));
    },
  };
}
