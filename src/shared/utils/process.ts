import { spawn } from 'node:child_process';

export interface CapturedOutput {
  code: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs a binary to completion and collects both output streams.
 * Rejects only when the process cannot be spawned; a non-zero exit resolves.
 */
export function runCapture(binary: string, args: string[]): Promise<CapturedOutput> {
  return new Promise((resolve, reject) => {
    const proc = spawn(binary, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    proc.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    proc.once('error', reject);
    proc.once('close', (code) => {
      resolve({
        code,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
      });
    });
  });
}
