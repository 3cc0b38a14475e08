import { formatMs, startStopwatch } from "resub-core";
import { compilePattern } from "./pattern.ts";
import { buildRunSummary } from "./phases/output.ts";
import { buildSubstitutionRequest } from "./phases/request.ts";
import { rewriteTree } from "./phases/rewrite.ts";
import type { FileProcessorFs, ResubOptions, RunSummary, SubstitutionRequest } from "./types.ts";

export type RunSubstitutionOptions = {
  logger?: (line: string) => void;
  fs?: FileProcessorFs;
};

export function replaceInTree(
  rootDirectory: string,
  searchPattern: string,
  replacementTemplate: string,
  options: ResubOptions = {},
): RunSummary {
  const request = buildSubstitutionRequest(
    rootDirectory,
    searchPattern,
    replacementTemplate,
    options,
  );

  return runSubstitution(request, { logger: options.logger, fs: options.fs });
}

/**
 * Runs one substitution over the request's tree.
 *
 * Throws `PatternCompileError` or `InvalidRootError` before any file is read.
 * Per-file failures end up in `RunSummary.errors` instead.
 */
export function runSubstitution(
  request: SubstitutionRequest,
  options: RunSubstitutionOptions = {},
): RunSummary {
  const stopwatch = startStopwatch();
  const log = options.logger ?? (() => {});

  const pattern = compilePattern(request.searchPattern, request.replacementTemplate, {
    ignoreCase: request.ignoreCase,
    multiline: request.multiline,
  });
  const rewrite = rewriteTree(request, pattern, { logger: log, fs: options.fs });
  const summary = buildRunSummary({ request, rewrite, elapsedMs: stopwatch.elapsedMs() });

  if (request.verbose) {
    log(
      `[resub] summary visited=${summary.filesVisited} matched=${summary.filesMatched} written=${summary.filesWritten} errors=${summary.errors.length} elapsed=${formatMs(summary.elapsedMs)}`,
    );
  }

  return summary;
}
