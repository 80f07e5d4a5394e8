/**
 * Process execution port for the shell driver, with a Node.js implementation
 * on top of child_process
 */

import { spawn } from 'node:child_process';

export type ProcessRunOptions = {
  cwd?: string;
  env?: Record<string, string>;
  /** Kills the process on abort */
  signal?: AbortSignal;
  timeout?: number;
};

export type ProcessOutput = {
  code: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order */
  combined: string;
};

/**
 * ProcessRunner port - run a command to completion and collect its output
 */
export interface ProcessRunner {
  run(command: string, args: string[], opts?: ProcessRunOptions): Promise<ProcessOutput>;
}

/**
 * Node.js ProcessRunner implementation
 */
export class NodeProcessRunner implements ProcessRunner {
  async run(command: string, args: string[], opts?: ProcessRunOptions): Promise<ProcessOutput> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: opts?.cwd,
        env: opts?.env ? { ...process.env, ...opts.env } : process.env,
        signal: opts?.signal,
        timeout: opts?.timeout,
        stdio: ['ignore', 'pipe', 'pipe']
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      const combined: Buffer[] = [];

      child.stdout.on('data', (chunk: Buffer) => {
        stdout.push(chunk);
        combined.push(chunk);
      });
      child.stderr.on('data', (chunk: Buffer) => {
        stderr.push(chunk);
        combined.push(chunk);
      });

      child.on('error', reject);

      // 'close' fires once the stdio streams are drained
      child.on('close', (code) => {
        resolve({
          code: code ?? -1,
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: Buffer.concat(stderr).toString('utf-8'),
          combined: Buffer.concat(combined).toString('utf-8')
        });
      });
    });
  }
}
