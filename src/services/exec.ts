/**
 * External command runner.
 *
 * Every adapter (kubectl, ssh, evaluator, deploy tool) goes through an ExecFn
 * so tests can substitute a scripted one.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 32 * 1024 * 1024;

export interface ExecOptions {
  timeoutMs: number;
  signal:    AbortSignal;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export type ExecFn = (file: string, args: string[], options: ExecOptions) => Promise<ExecResult>;

/** Non-zero exit, spawn failure, timeout or abort */
export class CommandError extends Error {
  readonly name = 'CommandError' as const;
  constructor(
    readonly command:  string,
    /** null when the process never exited on its own */
    readonly exitCode: number | null,
    readonly stderr:   string,
    readonly timedOut: boolean,
    options?: { cause?: unknown }
  ) {
    const reason = timedOut ? 'timed out' : exitCode === null ? 'failed to run' : `exited with ${exitCode}`;
    const detail = stderr.trim().split('\n').slice(-3).join(' | ');
    super(`${command} ${reason}${detail ? `: ${detail}` : ''}`, options);
  }
}

function field(err: unknown, key: string): unknown {
  return typeof err === 'object' && err !== null && key in err
    ? Object.getOwnPropertyDescriptor(err, key)?.value
    : undefined;
}

export const defaultExec: ExecFn = async (file, args, { timeoutMs, signal }) => {
  try {
    const { stdout, stderr } = await execFileAsync(file, args, {
      timeout:   timeoutMs,
      signal,
      maxBuffer: MAX_BUFFER,
      encoding:  'utf8',
    });
    return { stdout, stderr };
  } catch (err) {
    const code   = field(err, 'code');
    const stderr = field(err, 'stderr');
    const killed = field(err, 'killed') === true || field(err, 'name') === 'AbortError';
    throw new CommandError(
      file,
      typeof code === 'number' ? code : null,
      typeof stderr === 'string' ? stderr : err instanceof Error ? err.message : String(err),
      killed,
      { cause: err }
    );
  }
};

/**
 * Split a command template into argv, substituting {node}.
 * Whitespace separates arguments; no shell quoting is interpreted.
 */
export function expandCommand(template: string, nodeName: string): { file: string; args: string[] } {
  const [file, ...args] = template
    .trim()
    .split(/\s+/)
    .map((part) => part.replaceAll('{node}', nodeName));
  if (!file) throw new Error('Empty command template');
  return { file, args };
}
