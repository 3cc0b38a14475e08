import { readdirSync, statSync, type Dirent, type Stats } from "node:fs";
import path from "node:path";
import { describeError, InvalidRootError, isErrorWithCode } from "./errors.ts";

export type WalkTreeOptions = {
  root: string;
  /**
   * Normalized extension tokens (see `normalizeExtensions`). Empty or omitted
   * means every regular file is a candidate.
   */
  extensions?: ReadonlySet<string>;
  /**
   * Directory names skipped at any depth.
   */
  excludedDirectories?: ReadonlySet<string>;
  /**
   * Called when a directory below the root cannot be listed. The walk then
   * continues with the next sibling. Without a handler the error is thrown.
   */
  onDirectoryError?: (directory: string, error: unknown) => void;
};

type WalkContext = {
  extensions: ReadonlySet<string>;
  excludedDirectories: ReadonlySet<string>;
  onDirectoryError?: (directory: string, error: unknown) => void;
};

/**
 * Lazily yields candidate files below `root`, depth-first, with the entries
 * of every directory visited in code-unit order of their names. Symbolic
 * links are never followed.
 *
 * The root is validated eagerly: an `InvalidRootError` is thrown by this call
 * itself, before the first file is produced.
 */
export function walkTree(options: WalkTreeOptions): Generator<string, void, undefined> {
  const root = path.resolve(options.root);
  const rootEntries = readRootEntries(root);

  return walkEntries(root, rootEntries, {
    extensions: options.extensions ?? new Set(),
    excludedDirectories: options.excludedDirectories ?? new Set(),
    onDirectoryError: options.onDirectoryError,
  });
}

export function normalizeExtension(extension: string): string {
  return extension.trim().toLowerCase().replace(/^\.+/, "");
}

export function normalizeExtensions(extensions: Iterable<string>): Set<string> {
  const normalized = new Set<string>();
  for (const extension of extensions) {
    const token = normalizeExtension(extension);
    if (token.length > 0) {
      normalized.add(token);
    }
  }
  return normalized;
}

// "archive.tar.gz" -> "gz", ".env" -> "env", "Makefile" -> "".
export function fileExtension(fileName: string): string {
  const dotIndex = fileName.lastIndexOf(".");
  if (dotIndex < 0) {
    return "";
  }
  return fileName.slice(dotIndex + 1).toLowerCase();
}

export function isCandidateFile(fileName: string, extensions: ReadonlySet<string>): boolean {
  return extensions.size === 0 || extensions.has(fileExtension(fileName));
}

function readRootEntries(root: string): Dirent[] {
  let rootStats: Stats;
  try {
    rootStats = statSync(root);
  } catch (error) {
    if (isErrorWithCode(error) && error.code === "ENOENT") {
      throw new InvalidRootError(root, "directory does not exist");
    }
    throw new InvalidRootError(root, describeError(error));
  }

  if (!rootStats.isDirectory()) {
    throw new InvalidRootError(root, "not a directory");
  }

  try {
    return sortEntries(readdirSync(root, { withFileTypes: true }));
  } catch (error) {
    throw new InvalidRootError(root, describeError(error));
  }
}

function* walkEntries(
  directory: string,
  entries: readonly Dirent[],
  context: WalkContext,
): Generator<string, void, undefined> {
  for (const entry of entries) {
    const absolute = path.join(directory, entry.name);

    if (entry.isDirectory()) {
      if (context.excludedDirectories.has(entry.name)) {
        continue;
      }

      let children: Dirent[];
      try {
        children = sortEntries(readdirSync(absolute, { withFileTypes: true }));
      } catch (error) {
        if (!context.onDirectoryError) {
          throw error;
        }
        context.onDirectoryError(absolute, error);
        continue;
      }

      yield* walkEntries(absolute, children, context);
      continue;
    }

    if (entry.isFile() && isCandidateFile(entry.name, context.extensions)) {
      yield absolute;
    }
  }
}

function sortEntries(entries: Dirent[]): Dirent[] {
  return entries.sort((left, right) => {
    if (left.name === right.name) {
      return 0;
    }
    return left.name < right.name ? -1 : 1;
  });
}
