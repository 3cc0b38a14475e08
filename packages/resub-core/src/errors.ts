/**
 * Error types shared by the substitution engine and its command layer.
 *
 * `PatternCompileError` and `InvalidRootError` are fatal and surface before
 * any file is touched. `ReadError` and `WriteError` are recorded per file.
 */

export class PatternCompileError extends Error {
  readonly name = "PatternCompileError";
  readonly pattern: string;
  readonly reason: string;

  constructor(pattern: string, reason: string) {
    super(`Invalid search pattern ${JSON.stringify(pattern)}: ${reason}`);
    this.pattern = pattern;
    this.reason = reason;
    Object.setPrototypeOf(this, PatternCompileError.prototype);
  }
}

export class InvalidRootError extends Error {
  readonly name = "InvalidRootError";
  readonly root: string;

  constructor(root: string, reason: string) {
    super(`Invalid root directory ${root}: ${reason}`);
    this.root = root;
    Object.setPrototypeOf(this, InvalidRootError.prototype);
  }
}

export class ReadError extends Error {
  readonly name = "ReadError";
  readonly kind = "read";
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to read ${filePath}: ${describeError(cause)}`, { cause });
    this.filePath = filePath;
    Object.setPrototypeOf(this, ReadError.prototype);
  }
}

export class WriteError extends Error {
  readonly name = "WriteError";
  readonly kind = "write";
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Failed to write ${filePath}: ${describeError(cause)}`, { cause });
    this.filePath = filePath;
    Object.setPrototypeOf(this, WriteError.prototype);
  }
}

export type FileError = ReadError | WriteError;

export function isFatalError(error: unknown): error is PatternCompileError | InvalidRootError {
  return error instanceof PatternCompileError || error instanceof InvalidRootError;
}

export function isErrorWithCode(error: unknown): error is { code: string } {
  return typeof error === "object" && error !== null && "code" in error;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message.length > 0 ? error.message : error.name;
  }
  return String(error);
}
