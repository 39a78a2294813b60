import { spawn } from 'node:child_process';
import { constants } from 'node:os';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CapturedOutput {
  exitCode: number;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
}

/**
 * Seam between the driver and child processes. Tests swap in a fake.
 */
export interface CommandRunner {
  /** Run with inherited stdio; resolves to the exit code. */
  run(command: string, args: string[], options?: RunOptions): Promise<number>;
  /** Run with stdout and stderr captured together. */
  capture(command: string, args: string[], options?: RunOptions): Promise<CapturedOutput>;
}

/** Shell conventions: 127 for a command that could not start, 128+n for signal n. */
export const EXIT_NOT_FOUND = 127;

export function signalExitCode(signal: NodeJS.Signals): number {
  const num = constants.signals[signal];
  return 128 + (typeof num === 'number' ? num : 0);
}

function exitCodeFrom(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return signalExitCode(signal);
  return 1;
}

export const nodeRunner: CommandRunner = {
  run(command, args, options = {}) {
    return new Promise((resolve) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: 'inherit',
      });
      child.on('error', (err: NodeJS.ErrnoException) => {
        console.error(`${command}: ${err.code === 'ENOENT' ? 'command not found' : err.message}`);
        resolve(EXIT_NOT_FOUND);
      });
      child.on('close', (code, signal) => resolve(exitCodeFrom(code, signal)));
    });
  },

  capture(command, args, options = {}) {
    return new Promise((resolve) => {
      const chunks: Buffer[] = [];
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ['inherit', 'pipe', 'pipe'],
      });
      child.stdout?.on('data', (chunk: Buffer) => chunks.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => chunks.push(chunk));
      child.on('error', (err: NodeJS.ErrnoException) => {
        const reason = err.code === 'ENOENT' ? 'command not found' : err.message;
        resolve({ exitCode: EXIT_NOT_FOUND, output: `${command}: ${reason}\n` });
      });
      child.on('close', (code, signal) => {
        resolve({ exitCode: exitCodeFrom(code, signal), output: Buffer.concat(chunks).toString('utf-8') });
      });
    });
  },
};
