import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { ProvisionError } from '../errors.js';

const execFileAsync = promisify(execFile);

export interface ExecOptions {
  /** Extra variables merged over the current environment */
  env?: Record<string, string>;
  timeoutMs?: number;
}

/** Function that executes a command and returns stdout */
export type ExecFn = (command: string, args: string[], options?: ExecOptions) => Promise<string>;

export class CommandFailedError extends ProvisionError {
  readonly command: string;
  readonly exitCode: number | undefined;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    command: string,
    details: { exitCode?: number; stdout?: string; stderr?: string; cause?: unknown },
  ) {
    const stderr = details.stderr?.trim() ?? '';
    const suffix = stderr ? `: ${stderr.split('\n').at(-1)}` : '';
    super(
      'E_COMMAND_FAILED',
      `${command} failed${details.exitCode === undefined ? '' : ` (exit ${details.exitCode})`}${suffix}`,
      { cause: details.cause },
    );
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout ?? '';
    this.stderr = details.stderr ?? '';
  }
}

function readStream(err: object, key: 'stdout' | 'stderr'): string | undefined {
  if (!(key in err)) return undefined;
  const value: unknown = Reflect.get(err, key);
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return undefined;
}

/** Exit status and captured output of a failed child_process call */
export function describeExecFailure(command: string, err: unknown): CommandFailedError {
  if (typeof err !== 'object' || err === null) {
    return new CommandFailedError(command, { cause: err });
  }
  const code: unknown = Reflect.get(err, 'code');
  const status: unknown = Reflect.get(err, 'status');
  let exitCode: number | undefined;
  if (typeof code === 'number') exitCode = code;
  else if (typeof status === 'number') exitCode = status;
  return new CommandFailedError(command, {
    exitCode,
    stdout: readStream(err, 'stdout'),
    stderr: readStream(err, 'stderr'),
    cause: err,
  });
}

/** Default exec function that shells out to real commands */
export const defaultExec: ExecFn = async (command, args, options = {}) => {
  try {
    const { stdout } = await execFileAsync(command, args, {
      env: options.env ? { ...process.env, ...options.env } : process.env,
      timeout: options.timeoutMs ?? 600_000,
      maxBuffer: 16 * 1024 * 1024,
      encoding: 'utf-8',
    });
    return stdout;
  } catch (err: unknown) {
    throw describeExecFailure([command, ...args].join(' '), err);
  }
};
