import { Inject, Injectable } from '@nestjs/common';
import { exec } from 'node:child_process';
import { promisify } from 'node:util';
import { APP_CONFIG, type AppConfig } from '../../../config/app.config';
import { ProbeError, wrapProbeError } from '../../../lib/errors/ProbeError';

const execAsync = promisify(exec);

/** Shell exit status for "command not found". */
const EXIT_COMMAND_NOT_FOUND = 127;

/**
 * Extra time granted after the exec timeout fires. A grandchild that keeps
 * the stdout pipe open would otherwise hold the promise past the deadline.
 */
const KILL_GRACE_MS = 250;

/** Promise timeout helper that rejects with a ProbeError. */
function withTimeout<T>(
  p: Promise<T>,
  ms: number,
  command: string,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const t = setTimeout(
      () =>
        reject(
          new ProbeError(
            'COMMAND_TIMEOUT',
            `Command timed out after ${ms}ms: ${command}`,
            { command },
          ),
        ),
      ms,
    );
    p.then(
      (v) => {
        clearTimeout(t);
        resolve(v);
      },
      (e: unknown) => {
        clearTimeout(t);
        reject(e);
      },
    );
  });
}

interface ExecFailure {
  exitCode: number | null;
  errno: string | null;
  killed: boolean;
  signal: string | null;
}

/** Pull the fields child_process attaches to a failed exec. */
function readExecFailure(err: unknown): ExecFailure {
  const failure: ExecFailure = {
    exitCode: null,
    errno: null,
    killed: false,
    signal: null,
  };
  if (typeof err !== 'object' || err === null) return failure;
  if ('code' in err) {
    if (typeof err.code === 'number') failure.exitCode = err.code;
    if (typeof err.code === 'string') failure.errno = err.code;
  }
  if ('killed' in err && err.killed === true) failure.killed = true;
  if ('signal' in err && typeof err.signal === 'string') {
    failure.signal = err.signal;
  }
  return failure;
}

/**
 * Runs external commands through the system shell with a bounded timeout.
 * Read-only probes only; nothing here writes to the host.
 */
@Injectable()
export class CommandRunner {
  public constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * Run a shell command and return its trimmed stdout.
   * Rejects with ProbeError on timeout, non-zero exit or empty output.
   */
  public async run(
    command: string,
    timeoutMs: number = this.config.commandTimeoutMs,
  ): Promise<string> {
    let stdout: string;
    try {
      const result = await withTimeout(
        execAsync(command, {
          timeout: timeoutMs,
          killSignal: 'SIGKILL',
          windowsHide: true,
        }),
        timeoutMs + KILL_GRACE_MS,
        command,
      );
      stdout = result.stdout;
    } catch (err) {
      throw this.toProbeError(command, timeoutMs, err);
    }

    const out = stdout.trim();
    if (out.length === 0) {
      throw new ProbeError('EMPTY_OUTPUT', `No output from: ${command}`, {
        command,
        exitCode: 0,
      });
    }
    return out;
  }

  private toProbeError(
    command: string,
    timeoutMs: number,
    err: unknown,
  ): ProbeError {
    if (err instanceof ProbeError) return err;

    const f = readExecFailure(err);
    const meta = { command, exitCode: f.exitCode, signal: f.signal };

    if (f.killed) {
      return wrapProbeError(
        'COMMAND_TIMEOUT',
        `Command timed out after ${timeoutMs}ms: ${command}`,
        meta,
        err,
      );
    }
    if (f.exitCode === EXIT_COMMAND_NOT_FOUND || f.errno === 'ENOENT') {
      return wrapProbeError(
        'COMMAND_NOT_FOUND',
        `Command not found: ${command}`,
        meta,
        err,
      );
    }
    return wrapProbeError(
      'COMMAND_FAILED',
      `Command failed (exit ${f.exitCode ?? f.errno ?? 'unknown'}): ${command}`,
      meta,
      err,
    );
  }
}
