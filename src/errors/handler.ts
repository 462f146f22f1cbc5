import chalk from 'chalk';
import { AppError, ErrorCode, InvariantViolation } from './types';
import { HttpClientError, isHttpClientError } from '../api/http-client';
import { stringifyJson } from '../utils/json';

const TRANSPORT_CODES: Record<string, { message: string; code: ErrorCode }> = {
  ECONNREFUSED: { message: 'Connection refused', code: ErrorCode.CONNECTION_REFUSED },
  ETIMEDOUT: { message: 'Request timed out', code: ErrorCode.TIMEOUT },
  ECONNABORTED: { message: 'Request timed out', code: ErrorCode.TIMEOUT },
};

/**
 * Map a failed Steam request. Transport failures and server-side errors are
 * recoverable; Steam's web endpoints fail intermittently under load.
 */
export function mapHttpError(error: HttpClientError): AppError {
  const response = error.response;
  if (!response) {
    const known = error.code ? TRANSPORT_CODES[error.code] : undefined;
    if (known) {
      return new AppError(known.message, known.code, { originalError: error.message }, true);
    }
    return new AppError('Network error', ErrorCode.NETWORK_ERROR, { originalError: error.message, code: error.code }, true);
  }

  const statusCode = response.status;
  switch (true) {
    case statusCode === 401 || statusCode === 403:
      return new AppError('Steam rejected the session', ErrorCode.AUTH_FAILED, { statusCode });
    case statusCode === 404:
      return new AppError('Resource not found', ErrorCode.NOT_FOUND, { statusCode });
    case statusCode === 429:
      return new AppError(
        'Steam is rate limiting this client',
        ErrorCode.RATE_LIMITED,
        { statusCode, retryAfter: response.headers['retry-after'] ?? '60' },
        true
      );
    case statusCode >= 500:
      return new AppError(`Steam returned HTTP ${statusCode}`, ErrorCode.API_ERROR, { statusCode }, true);
    default:
      return new AppError(error.message || 'API request failed', ErrorCode.API_ERROR, { statusCode });
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

const FILE_SYSTEM_CODES: Record<string, { message: string; code: ErrorCode }> = {
  ENOENT: { message: 'File or directory not found', code: ErrorCode.FILE_NOT_FOUND },
  EACCES: { message: 'Permission denied', code: ErrorCode.PERMISSION_DENIED },
  EPERM: { message: 'Permission denied', code: ErrorCode.PERMISSION_DENIED },
  ENOSPC: { message: 'No space left on device', code: ErrorCode.DISK_FULL },
};

const NETWORK_SYSTEM_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT']);

/**
 * Map a Node.js system error. File errors keep the path they failed on, so
 * the user can tell which maFile is affected.
 */
export function mapSystemError(error: NodeJS.ErrnoException): AppError {
  const code = error.code ?? '';

  const fileError = FILE_SYSTEM_CODES[code];
  if (fileError) {
    return new AppError(fileError.message, fileError.code, { path: error.path, syscall: error.syscall });
  }

  if (NETWORK_SYSTEM_CODES.has(code)) {
    const transport = TRANSPORT_CODES[code];
    return new AppError(
      transport?.message ?? 'Network error',
      transport?.code ?? ErrorCode.NETWORK_ERROR,
      { originalCode: code },
      true
    );
  }

  return new AppError(
    error.message || 'System error',
    ErrorCode.UNKNOWN_ERROR,
    { originalCode: code, path: error.path, syscall: error.syscall }
  );
}

/**
 * Convert any thrown value to an AppError. InvariantViolation is not
 * converted here; handleError reports it separately.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (isHttpClientError(error)) {
    return mapHttpError(error);
  }
  if (isErrnoException(error)) {
    return mapSystemError(error);
  }
  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.UNKNOWN_ERROR, { originalError: error.name });
  }
  return new AppError(String(error), ErrorCode.UNKNOWN_ERROR, {});
}

/**
 * Handle and format error for CLI display
 */
export function handleError(error: unknown, debug: boolean = false): void {
  // A broken invariant is a bug, not bad input: always show the stack
  if (error instanceof InvariantViolation) {
    console.error(chalk.red.bold('\n✗ Internal error:'), error.message);
    console.error(chalk.dim('This is a bug. Your original files were backed up as *.bak before anything changed.'));
    if (error.stack) {
      console.error(chalk.dim(error.stack));
    }
    return;
  }

  const appError = toAppError(error);

  console.error(chalk.red.bold('\n✗ Error:'), appError.toUserMessage());

  const suggestion = appError.getRecoverySuggestion();
  if (suggestion) {
    console.error(chalk.yellow('\n💡 Suggestion:'), suggestion);
  }

  if (appError.isRecoverable && !suggestion) {
    console.error(chalk.yellow('\n💡 This error may be temporary. Please try again.'));
  }

  if (debug) {
    console.error(chalk.dim('\n📋 Debug Information:'));
    console.error(chalk.dim('  Error Code:'), appError.code);
    console.error(chalk.dim('  Technical Message:'), appError.message);
    console.error(chalk.dim('  Recoverable:'), appError.isRecoverable);

    if (appError.details && Object.keys(appError.details).length > 0) {
      console.error(chalk.dim('  Details:'));
      console.error(chalk.dim(stringifyJson(appError.details, 4)));
    }

    if (appError.stack) {
      console.error(chalk.dim('\n📚 Stack Trace:'));
      console.error(chalk.dim(appError.stack));
    }
  } else {
    console.error(chalk.dim('\n💻 Run with --debug for detailed error information'));
  }
}
