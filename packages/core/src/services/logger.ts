/**
 * Logger contract shared by core and the CLI.
 *
 * Core modules never write to the console themselves; progress and outcome
 * lines are logged by the CLI through its chalk logger.
 */

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}
