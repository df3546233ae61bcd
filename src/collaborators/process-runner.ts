import { spawn } from 'child_process';

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  timeoutMs: number;
  cwd?: string;
}

/**
 * Run a command to completion, killing it once `timeoutMs` has passed.
 *
 * Resolves for nonzero exits and timeouts; rejects only when the process could
 * not be started at all (missing binary, permissions).
 */
export type ProcessRunner = (command: string, args: string[], options: RunOptions) => Promise<ProcessResult>;

export const runProcess: ProcessRunner = (command, args, options) => {
  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command, args, { cwd: options.cwd, stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, options.timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', error => {
      clearTimeout(timer);
      reject(error);
    });

    child.on('close', exitCode => {
      clearTimeout(timer);
      resolve({
        exitCode,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        timedOut
      });
    });
  });
};
