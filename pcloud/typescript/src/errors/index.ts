/**
 * Error types for the pCloud client.
 */

import type { ZodIssue } from 'zod';

/**
 * Result codes documented by the pCloud API.
 * see https://docs.pcloud.com/errors/
 */
export const PCloudResultCode = {
  Ok: 0,
  LogInRequired: 1000,
  NoFullPathOrNameOrFolderIdProvided: 1001,
  NoFullPathOrFolderIdProvided: 1002,
  NoFileIdOrPathProvided: 1004,
  DateTimeFormatNotUnderstood: 1013,
  ProvideAtLeastToPathOrToFolderIdOrToName: 1037,
  ProvideUrl: 1040,
  LogInFailed: 2000,
  InvalidFileOrFolderName: 2001,
  ComponentOfParentDirectoryDoesNotExist: 2002,
  AccessDenied: 2003,
  FileOrFolderAlreadyExists: 2004,
  DirectoryDoesNotExist: 2005,
  FolderIsNotEmpty: 2006,
  CannotDeleteRootFolder: 2007,
  UserOverQuota: 2008,
  FileNotFound: 2009,
  InvalidPath: 2010,
  VerifyMail: 2014,
  SharedFolderInShared: 2023,
  OnlyShareOwn: 2026,
  ActiveShares: 2028,
  ConnectionBroken: 2041,
  CannotRenameRoot: 2042,
  MoveIntoSubfolder: 2043,
  TooManyLogins: 4000,
  InternalError: 5000,
  InternalUploadError: 5001,
} as const;

export type PCloudResultCode = (typeof PCloudResultCode)[keyof typeof PCloudResultCode];

const RESULT_MESSAGES: Record<number, string> = {
  1000: 'Log in required',
  1001: 'No full path or name/folderid provided',
  1002: 'No full path or folderid provided',
  1004: 'No fileid or path provided',
  1013: 'Date/time format not understood',
  1037: 'Please provide at least one of topath, tofolderid or toname',
  1040: 'Please provide url',
  2000: 'Log in failed',
  2001: 'Invalid file/folder name',
  2002: 'A component of parent directory does not exist',
  2003: 'Access denied',
  2004: 'File or folder already exists',
  2005: 'Directory does not exist',
  2006: 'Folder is not empty',
  2007: 'Cannot delete the root folder',
  2008: 'User is over quota',
  2009: 'File not found',
  2010: 'Invalid path',
  2014: 'Please verify your email address to perform this action',
  2023: 'You are trying to place shared folder into another shared folder',
  2026: 'You can only share your own files or folders',
  2028: 'There are active shares or sharerequests for this folder',
  2041: 'Connection broken',
  2042: 'Cannot rename the root folder',
  2043: 'Cannot move a folder to a subfolder of itself',
  4000: 'Too many login tries from this IP address',
  5000: 'Internal error, try again later',
  5001: 'Internal upload error',
};

/**
 * Default message for a result code
 */
export function describeResultCode(code: number): string {
  return RESULT_MESSAGES[code] ?? `Unknown result code ${code}`;
}

/**
 * Base error class for pCloud operations
 */
export abstract class PCloudError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Malformed construction input. Raised locally, never by the server.
 */
export class ConfigurationError extends PCloudError {
  readonly code = 'PCLOUD_CONFIG';
  readonly retryable = false;

  constructor(
    message: string,
    public readonly issues: ZodIssue[] = []
  ) {
    super(`Configuration error: ${message}`);
  }

  static released(): ConfigurationError {
    return new ConfigurationError('Client handle has already been released');
  }

  static alreadyExecuted(operation: string): ConfigurationError {
    return new ConfigurationError(`${operation} request has already been executed`);
  }
}

/**
 * Login rejected by the server
 */
export class AuthenticationError extends PCloudError {
  readonly code = 'PCLOUD_AUTH';
  readonly retryable = false;

  constructor(
    public readonly reason: string,
    public readonly resultCode?: number
  ) {
    super(`Authentication error: ${reason}`);
  }
}

export type TransportErrorKind = 'timeout' | 'cancelled' | 'connection';

/**
 * Network failure, timeout or cancellation
 */
export class TransportError extends PCloudError {
  readonly code = 'PCLOUD_TRANSPORT';

  constructor(
    message: string,
    public readonly kind: TransportErrorKind = 'connection'
  ) {
    super(`Transport error: ${message}`);
  }

  get retryable(): boolean {
    return this.kind !== 'cancelled';
  }

  static timeout(ms: number): TransportError {
    return new TransportError(`Request timeout after ${ms}ms`, 'timeout');
  }

  static cancelled(): TransportError {
    return new TransportError('Request was cancelled', 'cancelled');
  }
}

/**
 * The server accepted the connection but rejected the operation
 */
export class ServerError extends PCloudError {
  readonly code = 'PCLOUD_SERVER';

  constructor(
    message: string,
    public readonly resultCode?: number,
    public readonly httpStatus?: number
  ) {
    super(`Server error: ${message}`);
  }

  get retryable(): boolean {
    if (this.httpStatus !== undefined && this.httpStatus >= 500) return true;
    return this.resultCode !== undefined && this.resultCode >= 5000;
  }

  static fromResult(resultCode: number, message?: string): ServerError {
    return new ServerError(message ?? describeResultCode(resultCode), resultCode);
  }

  static fromStatus(status: number): ServerError {
    return new ServerError(`HTTP ${status}`, undefined, status);
  }

  static invalidResponse(detail: string): ServerError {
    return new ServerError(`Unexpected response: ${detail}`);
  }
}

export interface ChecksumMismatch {
  algorithm: string;
  expected: string;
  computed: string;
}

/**
 * Checksum mismatch detected locally
 */
export class IntegrityError extends PCloudError {
  readonly code = 'PCLOUD_INTEGRITY';
  readonly retryable = false;

  constructor(
    message: string,
    public readonly mismatches: ChecksumMismatch[] = []
  ) {
    super(`Integrity error: ${message}`);
  }
}

/**
 * Check if error is a pCloud error
 */
export function isPCloudError(error: unknown): error is PCloudError {
  return error instanceof PCloudError;
}

/**
 * Check if error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return isPCloudError(error) && error.retryable;
}
