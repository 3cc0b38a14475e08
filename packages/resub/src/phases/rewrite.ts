import path from "node:path";
import { ReadError, walkTree } from "resub-core";
import { processFile } from "../file-processor.ts";
import type { CompiledPattern } from "../pattern.ts";
import type { FileOutcome, FileProcessorFs, RunError, SubstitutionRequest } from "../types.ts";

export type RewritePhaseOptions = {
  logger?: (line: string) => void;
  fs?: FileProcessorFs;
};

export type RewritePhaseResult = {
  files: FileOutcome[];
  errors: RunError[];
};

/**
 * Walks the tree and processes each candidate in walk order, one file at a
 * time. Per-file failures are collected and never stop the walk. Files written
 * before a later failure stay written.
 */
export function rewriteTree(
  request: SubstitutionRequest,
  pattern: CompiledPattern,
  options: RewritePhaseOptions = {},
): RewritePhaseResult {
  const root = request.rootDirectory;
  const files: FileOutcome[] = [];
  const errors: RunError[] = [];

  const candidates = walkTree({
    root,
    extensions: request.extensions,
    excludedDirectories: request.excludedDirectories,
    onDirectoryError: (directory, error) => {
      errors.push({
        path: directory,
        file: path.relative(root, directory),
        error: new ReadError(directory, error),
      });
    },
  });

  for (const filePath of candidates) {
    const outcome = processFile(filePath, pattern, {
      root,
      force: request.force,
      verbose: request.verbose,
      logger: options.logger,
      fs: options.fs,
    });
    files.push(outcome);
    if (outcome.error) {
      errors.push({ path: outcome.path, file: outcome.file, error: outcome.error });
    }
  }

  return { files, errors };
}
