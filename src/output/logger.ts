/**
 * Console logger for the CLI side of the desk.
 *
 * The one-shot commands print report text to stdout; silent mode keeps
 * diagnostics out of that stream so the output can be piped. HTTP request
 * logging belongs to Fastify's own logger, not this module.
 */
import chalk from 'chalk';
import { LOG_PREFIX } from '../config/constants';

let silentMode = false;
let verboseMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log(), debug() and warn() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
  silentMode = silent;
}

export function setVerboseMode(verbose: boolean): void {
  verboseMode = verbose;
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
  if (!silentMode) {
    console.log(chalk.cyan(LOG_PREFIX), ...args);
  }
}

/**
 * Verbose-only diagnostics to stderr.
 */
export function debug(...args: unknown[]): void {
  if (verboseMode && !silentMode) {
    console.error(chalk.gray(LOG_PREFIX), ...args);
  }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
  if (!silentMode) {
    console.warn(chalk.yellow(`${LOG_PREFIX} Warning:`), ...args);
  }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
  console.error(chalk.red(`${LOG_PREFIX} Error:`), ...args);
}
