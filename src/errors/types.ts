/**
 * Error codes for different error scenarios
 */
export enum ErrorCode {
  // Manifest and account store
  UNKNOWN_MANIFEST_VERSION = 'UNKNOWN_MANIFEST_VERSION',
  MANIFEST_INVALID = 'MANIFEST_INVALID',
  ACCOUNT_INVALID = 'ACCOUNT_INVALID',
  MISSING_PASSKEY = 'MISSING_PASSKEY',
  UNEXPECTED_PASSKEY = 'UNEXPECTED_PASSKEY',
  ACCOUNT_LOAD_FAILED = 'ACCOUNT_LOAD_FAILED',
  BACKUP_FAILED = 'BACKUP_FAILED',
  MIGRATION_REQUIRED = 'MIGRATION_REQUIRED',
  DECRYPTION_FAILED = 'DECRYPTION_FAILED',
  ENCRYPTION_FAILED = 'ENCRYPTION_FAILED',

  // Authentication / protocol
  AUTH_FAILED = 'AUTH_FAILED',
  SESSION_REQUIRED = 'SESSION_REQUIRED',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  TRANSFER_MISSING_DATA = 'TRANSFER_MISSING_DATA',
  TRANSFER_MISSING_URLS = 'TRANSFER_MISSING_URLS',
  TRANSFER_MISSING_PARAMETERS = 'TRANSFER_MISSING_PARAMETERS',
  ENROLLMENT_FAILED = 'ENROLLMENT_FAILED',

  // Network errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  CONNECTION_REFUSED = 'CONNECTION_REFUSED',

  // API errors
  API_ERROR = 'API_ERROR',
  RATE_LIMITED = 'RATE_LIMITED',
  NOT_FOUND = 'NOT_FOUND',

  // File system errors
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  DISK_FULL = 'DISK_FULL',

  // Generic
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  OPERATION_CANCELLED = 'OPERATION_CANCELLED',
}

export type ErrorDetails = Record<string, unknown>;

function detail(details: ErrorDetails | undefined, key: string): string {
  const value = details?.[key];
  return typeof value === 'string' && value ? value : 'unknown';
}

/**
 * Custom application error class with error codes and recovery hints
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: ErrorDetails,
    public isRecoverable: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to user-friendly message
   */
  toUserMessage(): string {
    switch (this.code) {
      case ErrorCode.UNKNOWN_MANIFEST_VERSION:
        return `Unsupported manifest version: ${detail(this.details, 'version')}`;

      case ErrorCode.MISSING_PASSKEY:
        return 'A passkey is required to decrypt the maFiles.';

      case ErrorCode.UNEXPECTED_PASSKEY:
        return 'A passkey was provided but the manifest is not encrypted. Refusing to encrypt the maFiles.';

      case ErrorCode.ACCOUNT_LOAD_FAILED:
        return this.message;

      case ErrorCode.BACKUP_FAILED:
        return `Could not back up ${detail(this.details, 'path')}. Nothing was changed.`;

      case ErrorCode.MIGRATION_REQUIRED:
        return `The maFiles in ${detail(this.details, 'path')} are in an old format and must be migrated first.`;

      case ErrorCode.DECRYPTION_FAILED:
        return `Decryption failed for ${detail(this.details, 'path')}. The passkey may be wrong or the file corrupted.`;

      case ErrorCode.AUTH_FAILED:
        return 'Authentication failed. Please check your credentials and try again.';

      case ErrorCode.SESSION_REQUIRED:
        return 'You must be logged in to do that.';

      case ErrorCode.INVALID_RESPONSE:
        return 'Steam returned a response that could not be understood.';

      case ErrorCode.NETWORK_ERROR:
        return 'Network connection failed. Please check your internet connection and try again.';

      case ErrorCode.TIMEOUT:
        return 'Request timed out. The server took too long to respond.';

      case ErrorCode.CONNECTION_REFUSED:
        return 'Connection refused. The server may be down or unreachable.';

      case ErrorCode.FILE_NOT_FOUND:
        return `File not found: ${detail(this.details, 'path')}`;

      case ErrorCode.PERMISSION_DENIED:
        return `Permission denied: ${detail(this.details, 'path')}`;

      case ErrorCode.DISK_FULL:
        return 'No space left on device. Please free up some space and try again.';

      case ErrorCode.RATE_LIMITED:
        return this.message || 'Too many requests. Please try again later.';

      case ErrorCode.NOT_FOUND:
        return 'Resource not found.';

      case ErrorCode.OPERATION_CANCELLED:
        return 'Operation cancelled by user.';

      case ErrorCode.VALIDATION_ERROR:
        return this.message || 'Validation error. Please check your input.';

      default:
        return this.message || 'An unknown error occurred.';
    }
  }

  /**
   * Get recovery suggestion for the error
   */
  getRecoverySuggestion(): string | null {
    switch (this.code) {
      case ErrorCode.MISSING_PASSKEY:
        return 'Run again with --passkey-stdin or --ask-passkey';

      case ErrorCode.UNEXPECTED_PASSKEY:
        return 'Run again without a passkey';

      case ErrorCode.MIGRATION_REQUIRED:
        return 'Run: steam-auth migrate';

      case ErrorCode.ACCOUNT_LOAD_FAILED:
      case ErrorCode.DECRYPTION_FAILED:
        return 'Check the passkey. Backups of the original files are kept as *.bak';

      case ErrorCode.SESSION_REQUIRED:
        return 'Run: steam-auth setup';

      case ErrorCode.NETWORK_ERROR:
      case ErrorCode.TIMEOUT:
      case ErrorCode.CONNECTION_REFUSED:
        return 'Check your internet connection and try again';

      case ErrorCode.RATE_LIMITED:
        return 'Wait a few moments before trying again';

      case ErrorCode.FILE_NOT_FOUND:
        return 'Check that the file path is correct';

      case ErrorCode.PERMISSION_DENIED:
        return 'Check file permissions or try running with appropriate privileges';

      case ErrorCode.DISK_FULL:
        return 'Free up disk space on your local machine';

      default:
        return null;
    }
  }
}

/**
 * A broken internal invariant, such as an upgrade chain that did not reach
 * the current version. Never caused by user input and never recoverable.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolation';
    Error.captureStackTrace(this, this.constructor);
  }
}
