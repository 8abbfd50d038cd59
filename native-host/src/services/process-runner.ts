/**
 * Promise wrapper around child_process.execFile
 */
import { execFile } from 'child_process';

export interface ProcessResult {
  stdout: string;
  stderr: string;
}

/**
 * Run an executable without a shell
 */
export type RunFileFn = (file: string, args: string[], timeoutMs?: number) => Promise<ProcessResult>;

/**
 * Error raised when a process exits unsuccessfully
 */
export class ProcessError extends Error {
  readonly stderr: string;

  constructor(message: string, stderr: string) {
    super(message);
    this.name = 'ProcessError';
    this.stderr = stderr;
  }
}

export const runFile: RunFileFn = (file, args, timeoutMs = 10000) => {
  return new Promise((resolve, reject) => {
    execFile(file, args, { timeout: timeoutMs, encoding: 'utf8' }, (error, stdout, stderr) => {
      if (error) {
        const detail = stderr.trim() || error.message;
        reject(new ProcessError(`${file} failed: ${detail}`, stderr));
        return;
      }
      resolve({ stdout, stderr });
    });
  });
};
