/**
 * Error Classes
 *
 * Every failure a listing or file operation can report. Each class carries
 * an ErrorCode so callers can branch on `code` without instanceof chains.
 */

import type { ErrorCode } from "./types.js";

/**
 * Base error for file operations and directory listings.
 */
export class FileOperationError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = "FileOperationError";
    this.code = code;
  }
}

/**
 * Thrown when a directory cannot be resolved, read or stat'ed.
 */
export class AccessError extends FileOperationError {
  constructor(message: string, code: ErrorCode = "ACCESS_DENIED") {
    super(message, code);
    this.name = "AccessError";
  }
}

/**
 * Thrown when a path that must be a directory is something else.
 */
export class NotADirectoryError extends AccessError {
  constructor(message: string) {
    super(message, "NOT_A_DIRECTORY");
    this.name = "NotADirectoryError";
  }
}

/**
 * Target of a copy, move or mkdir already exists.
 */
export class AlreadyExistsError extends FileOperationError {
  constructor(message: string) {
    super(message, "ALREADY_EXISTS");
    this.name = "AlreadyExistsError";
  }
}

/**
 * The user submitted an empty name.
 */
export class UserCancelledError extends FileOperationError {
  constructor(message: string) {
    super(message, "USER_CANCELLED");
    this.name = "UserCancelledError";
  }
}

/**
 * The parent sentinel cannot be deleted or renamed.
 */
export class ProtectedEntryError extends FileOperationError {
  constructor(message: string) {
    super(message, "PROTECTED_ENTRY");
    this.name = "ProtectedEntryError";
  }
}

/**
 * A new name contains a path separator or is "." / "..".
 */
export class InvalidNameError extends FileOperationError {
  constructor(message: string) {
    super(message, "INVALID_NAME");
    this.name = "InvalidNameError";
  }
}

/**
 * Any other OS-level failure.
 */
export class OperationFailure extends FileOperationError {
  constructor(message: string) {
    super(message, "OPERATION_FAILED");
    this.name = "OperationFailure";
  }
}

/**
 * Narrows an unknown thrown value to a Node errno error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/**
 * Maps a thrown value from a filesystem call to the error taxonomy.
 *
 * @param error - Value caught from a node:fs call
 * @param fallbackMessage - Message prefix describing what was attempted
 */
export function toOperationError(error: unknown, fallbackMessage: string): FileOperationError {
  if (error instanceof FileOperationError) {
    return error;
  }

  const detail = error instanceof Error ? error.message : String(error);
  const message = `${fallbackMessage}: ${detail}`;

  if (isErrnoException(error)) {
    switch (error.code) {
      case "EEXIST":
      case "ENOTEMPTY":
        return new AlreadyExistsError(message);
      case "EACCES":
      case "EPERM":
        return new AccessError(message);
      case "ENOTDIR":
        return new NotADirectoryError(message);
    }
  }

  return new OperationFailure(message);
}
