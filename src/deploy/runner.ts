/**
 * Child process runner for the deployment CLI
 */

import spawn from 'cross-spawn';
import type { CommandResult } from '../types/netlify.js';

export interface RunOptions {
  cwd: string;
  /** Inherit stdio so the user can answer the tool's own prompts */
  interactive?: boolean;
}

/**
 * Runs a command and never rejects; spawn failures land in `spawnError`
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: RunOptions
) => Promise<CommandResult>;

/**
 * Run a command and capture its output. No timeout: an interactive prompt
 * from the tool blocks until the user answers it.
 */
export const runCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve) => {
    const proc = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: options.interactive ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      // cross-spawn resolves Windows .cmd shims and escapes args without a shell
      env: process.env,
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString('utf-8');
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString('utf-8');
    });

    proc.on('close', (code) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode: code, stdout, stderr });
    });

    proc.on('error', (error) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode: null, stdout, stderr, spawnError: error.message });
    });
  });
};
