/**
 * Process runner for kubectl and helm.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { CommandError, ExportAbortedError } from '../errors.js';
import { getString, isRecord } from '../utils/manifest.js';

const execFileAsync = promisify(execFile);

export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunOptions,
) => Promise<CommandResult>;

/** Render a command line for logs and error messages. */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args.map((a) => (/\s/.test(a) ? JSON.stringify(a) : a))].join(' ');
}

/**
 * Run a command with a hard timeout. Non-zero exit, timeout and spawn
 * failures all surface as CommandError; an aborted signal as
 * ExportAbortedError.
 */
export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const line = formatCommand(command, args);

  if (options.signal?.aborted) throw new ExportAbortedError();

  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      env: process.env,
      maxBuffer: 50 * 1024 * 1024,
      timeout: timeoutMs,
      signal: options.signal,
    });
    return { stdout, stderr };
  } catch (err) {
    if (options.signal?.aborted) throw new ExportAbortedError();

    const stderr = getString(err, 'stderr')?.trim() ?? '';
    const timedOut = isRecord(err) && err.killed === true;
    const reason = timedOut
      ? `timed out after ${timeoutMs / 1000}s`
      : stderr || (err instanceof Error ? err.message : String(err));

    throw new CommandError(`Command failed: ${line}: ${reason}`, line, timedOut, stderr, err);
  }
};
