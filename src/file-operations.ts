/**
 * File Operations
 *
 * Copy, move, delete, rename and mkdir for the two-pane browser.
 * Each operation validates its preconditions before touching the
 * filesystem and reports the outcome as an OperationResult instead of
 * throwing, so a failure never escapes into the event loop.
 */

import { cp, lstat, mkdir, rename, rm } from "node:fs/promises";
import { basename, dirname, join, relative, isAbsolute, sep } from "node:path";
import type { Entry, OperationResult } from "./types.js";
import {
  AlreadyExistsError,
  FileOperationError,
  InvalidNameError,
  OperationFailure,
  ProtectedEntryError,
  UserCancelledError,
  isErrnoException,
  toOperationError,
} from "./errors.js";
import { fsLog as log } from "./logger.js";

export type FileOperationResult = OperationResult<string, FileOperationError>;

function success(value: string): FileOperationResult {
  return { ok: true, value };
}

function failure(error: FileOperationError): FileOperationResult {
  return { ok: false, error };
}

/**
 * True if anything (including a dangling symlink) exists at the path.
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

/**
 * True if `candidate` equals `ancestor` or lies beneath it.
 */
export function isSameOrDescendant(ancestor: string, candidate: string): boolean {
  const rel = relative(ancestor, candidate);
  if (rel === "") {
    return true;
  }
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * Checks a user-supplied name for a new directory or a rename.
 * Returns null when the name is usable.
 */
export function validateName(name: string): FileOperationError | null {
  if (name === "") {
    return new UserCancelledError("Empty name");
  }
  if (name === "." || name === "..") {
    return new InvalidNameError(`"${name}" is not a valid name`);
  }
  if (name.includes("/") || name.includes(sep) || name.includes("\0")) {
    return new InvalidNameError(`"${name}" must not contain a path separator`);
  }
  return null;
}

async function copyTree(source: string, target: string): Promise<void> {
  await cp(source, target, {
    recursive: true,
    preserveTimestamps: true,
    errorOnExist: true,
    force: false,
  });
}

/**
 * Copies or moves `source` into `destinationDirectory`, keeping its name.
 *
 * The existence check on the target runs before any mutation, so a
 * collision leaves both sides untouched. Moves use rename and fall back
 * to copy-then-remove across filesystems.
 *
 * @param source - Absolute path of the file or directory to transfer
 * @param destinationDirectory - Directory receiving the entry
 * @param move - Remove the source after transfer
 * @returns The target path on success
 */
export async function copyOrMove(
  source: string,
  destinationDirectory: string,
  move = false
): Promise<FileOperationResult> {
  const target = join(destinationDirectory, basename(source));
  const verb = move ? "Move" : "Copy";

  try {
    if (!(await pathExists(source))) {
      return failure(new OperationFailure(`Source does not exist: ${source}`));
    }

    if (await pathExists(target)) {
      return failure(new AlreadyExistsError(`Destination already exists: ${target}`));
    }

    if (isSameOrDescendant(source, destinationDirectory)) {
      return failure(
        new OperationFailure(`Cannot ${verb.toLowerCase()} "${source}" into itself`)
      );
    }

    if (move) {
      try {
        await rename(source, target);
      } catch (error) {
        if (!isErrnoException(error) || error.code !== "EXDEV") {
          throw error;
        }
        log.info(`Cross-device move, copying: ${source} -> ${target}`);
        await copyTree(source, target);
        await rm(source, { recursive: true, force: true });
      }
    } else {
      await copyTree(source, target);
    }
  } catch (error) {
    log.error(`${verb} failed: ${source} -> ${target}`, error);
    return failure(toOperationError(error, `${verb} failed`));
  }

  log.info(`${verb}: ${source} -> ${target}`);
  return success(target);
}

/**
 * Deletes an entry. Directories are removed recursively; a path that is
 * already gone counts as deleted. The parent sentinel is refused.
 *
 * @returns The deleted path
 */
export async function deleteEntry(entry: Entry): Promise<FileOperationResult> {
  if (entry.kind === "parent") {
    return failure(new ProtectedEntryError("Cannot delete the parent entry"));
  }

  try {
    await rm(entry.path, { recursive: true, force: true });
  } catch (error) {
    log.error(`Delete failed: ${entry.path}`, error);
    return failure(toOperationError(error, "Delete failed"));
  }

  log.info(`Deleted: ${entry.path}`);
  return success(entry.path);
}

/**
 * Renames an entry within its own directory.
 * An empty name is a cancellation, not an error.
 *
 * @returns The new path
 */
export async function renameEntry(entry: Entry, newName: string): Promise<FileOperationResult> {
  if (entry.kind === "parent") {
    return failure(new ProtectedEntryError("Nothing to rename"));
  }

  const name = newName.trim();
  const invalid = validateName(name);
  if (invalid) {
    return failure(invalid);
  }

  const target = join(dirname(entry.path), name);
  if (target === entry.path) {
    return success(target);
  }

  try {
    await rename(entry.path, target);
  } catch (error) {
    log.error(`Rename failed: ${entry.path} -> ${target}`, error);
    return failure(toOperationError(error, "Rename failed"));
  }

  log.info(`Renamed: ${entry.path} -> ${target}`);
  return success(target);
}

/**
 * Creates exactly one new directory level under `parentPath`.
 * Missing intermediate directories are not created.
 *
 * @returns The created path
 */
export async function makeDirectory(parentPath: string, name: string): Promise<FileOperationResult> {
  const trimmed = name.trim();
  const invalid = validateName(trimmed);
  if (invalid) {
    return failure(invalid);
  }

  const target = join(parentPath, trimmed);
  try {
    await mkdir(target);
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") {
      return failure(new AlreadyExistsError(`Directory already exists: ${target}`));
    }
    log.error(`Mkdir failed: ${target}`, error);
    return failure(toOperationError(error, "Create directory failed"));
  }

  log.info(`Created directory: ${target}`);
  return success(target);
}
