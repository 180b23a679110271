import {
  APIError,
  ConfigError,
  NetworkError,
  TransactionNotFoundError,
  UnknownFieldError,
} from '../errors.js';
import type { Logger } from '../logger.js';
import { errorMessage } from '../utils.js';

/**
 * Process exit codes, following BSD sysexits.h.
 */
export const ExitCode = {
  OK: 0,
  USAGE: 64,
  UNAVAILABLE: 69,
  SOFTWARE: 70,
  IOERR: 74,
  NOPERM: 77,
  CONFIG: 78,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * How a failed run is reported.
 */
export interface Failure {
  exitCode: ExitCode;
  kind: string;
  message: string;
}

interface FileSystemError extends Error {
  syscall: string;
  path?: string;
}

function isFileSystemError(error: unknown): error is FileSystemError {
  return error instanceof Error && 'syscall' in error && typeof error.syscall === 'string';
}

/**
 * Map a thrown value to an exit code and a short description.
 */
export function classifyError(error: unknown): Failure {
  const message = errorMessage(error);

  if (error instanceof APIError) {
    let exitCode: ExitCode;
    if (error.status === 401 || error.status === 403) {
      exitCode = ExitCode.NOPERM;
    } else if (error.status < 500) {
      exitCode = ExitCode.SOFTWARE;
    } else {
      exitCode = ExitCode.UNAVAILABLE;
    }
    return { exitCode, kind: 'PayPal API error', message };
  }
  if (error instanceof NetworkError) {
    return { exitCode: ExitCode.UNAVAILABLE, kind: 'network error', message };
  }
  if (error instanceof ConfigError) {
    return { exitCode: ExitCode.CONFIG, kind: 'configuration error', message };
  }
  if (error instanceof TransactionNotFoundError || error instanceof UnknownFieldError) {
    return { exitCode: ExitCode.SOFTWARE, kind: 'lookup error', message };
  }
  if (isFileSystemError(error)) {
    return { exitCode: ExitCode.IOERR, kind: 'I/O error', message };
  }
  const name = error instanceof Error ? error.name : typeof error;
  return { exitCode: ExitCode.SOFTWARE, kind: `internal ${name}`, message };
}

/**
 * Log a failure at fatal level, with the stack at debug level, and return
 * the exit code for it.
 */
export function reportFailure(error: unknown, logger: Logger): ExitCode {
  const failure = classifyError(error);
  logger.fatal(`${failure.kind}: ${failure.message}`);
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
  return failure.exitCode;
}
