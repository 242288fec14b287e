/**
 * External process boundary (gh, git)
 */

import { execFile } from 'child_process';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: { cwd?: string }): Promise<CommandResult>;
}

export class CommandFailedError extends Error {
  command: string;
  stderr: string;

  constructor(command: string, stderr: string, cause: string) {
    super(`${command} failed: ${stderr.trim() || cause}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.stderr = stderr;
  }
}

/**
 * Runs commands without a shell; rejects with CommandFailedError on a
 * non-zero exit or when the binary cannot be started.
 */
export const execFileRunner: CommandRunner = {
  run(command, args, options = {}) {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        [...args],
        { cwd: options.cwd, maxBuffer: 64 * 1024 * 1024, encoding: 'utf-8' },
        (error, stdout, stderr) => {
          if (error) {
            reject(new CommandFailedError([command, ...args].join(' '), stderr, error.message));
            return;
          }
          resolve({ stdout, stderr });
        }
      );
    });
  }
};
