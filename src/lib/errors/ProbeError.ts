/**
 * Raised when a host probe cannot produce a value. Probes never let this
 * escape to HTTP handlers; it only carries the reason for logging.
 */

export type ProbeErrorCode =
  | 'COMMAND_TIMEOUT'
  | 'COMMAND_NOT_FOUND'
  | 'COMMAND_FAILED'
  | 'EMPTY_OUTPUT'
  | 'READ_FAILED';

export interface ProbeErrorMeta {
  command?: string;
  path?: string;
  exitCode?: number | null;
  signal?: string | null;
  cause?: unknown;
}

export class ProbeError extends Error {
  public readonly code: ProbeErrorCode;
  public readonly meta: ProbeErrorMeta;

  public constructor(
    code: ProbeErrorCode,
    message: string,
    meta: ProbeErrorMeta = {},
  ) {
    super(message);
    this.name = 'ProbeError';
    this.code = code;
    this.meta = meta;
  }
}

/**
 * Wrap a raw failure (exec or fs error) into ProbeError, keeping it as cause.
 */
export function wrapProbeError(
  code: ProbeErrorCode,
  message: string,
  meta: ProbeErrorMeta,
  err: unknown,
): ProbeError {
  return new ProbeError(code, message, { ...meta, cause: err });
}
