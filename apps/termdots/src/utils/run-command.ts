import { execFile } from 'child_process';

/**
 * Outcome of a finished external command
 */
export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs a command to completion. Rejects only when it cannot be started.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

// Pixel listings run ~40 bytes per pixel
const MAX_OUTPUT_BYTES = 512 * 1024 * 1024;

/**
 * execFile wrapper: a non-zero exit resolves with its code and stderr
 */
export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { encoding: 'utf8', maxBuffer: MAX_OUTPUT_BYTES }, (error, stdout, stderr) => {
      if (error && typeof error.code !== 'number') {
        reject(error);
        return;
      }
      resolve({ code: error && typeof error.code === 'number' ? error.code : 0, stdout, stderr });
    });
  });
