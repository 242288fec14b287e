/**
 * Command I/O
 * Commands write reports through `out` and progress through `logger`, and
 * return an exit code instead of exiting.
 */

import { AuditError, DevtoolsConfig, Logger, effectiveLogLevel, loadConfig } from 'ecosys-audit';
import { createConsoleLogger } from './logger';

export interface CommandIO {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Report output (stdout) */
  out: (text: string) => void;
  /** Built once the configuration is known */
  createLogger: (config: DevtoolsConfig) => Logger;
  /** Colour reports; off when stdout is not a terminal */
  color: boolean;
}

export interface GlobalOptions {
  verbose?: boolean;
}

export function processIO(globals: GlobalOptions = {}): CommandIO {
  return {
    cwd: process.cwd(),
    env: process.env,
    out: (text) => process.stdout.write(text.endsWith('\n') ? text : `${text}\n`),
    createLogger: (config) => createConsoleLogger(effectiveLogLevel(config, globals.verbose === true)),
    color: process.stdout.isTTY === true
  };
}

export interface CommandSetup {
  config: DevtoolsConfig;
  logger: Logger;
}

export function setup(io: CommandIO): CommandSetup {
  const { config, configPath } = loadConfig(io.cwd, io.env);
  const logger = io.createLogger(config);
  if (configPath) {
    logger.debug(`[CONFIG] Using ${configPath}`);
  }
  return { config, logger };
}

/**
 * Exit code for an error that escaped a command: 2 for input and
 * configuration errors, 1 otherwise
 */
export function failureExitCode(error: unknown): number {
  return error instanceof AuditError ? 2 : 1;
}
