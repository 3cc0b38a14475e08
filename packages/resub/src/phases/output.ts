import type { RunStatus, RunSummary, SubstitutionRequest } from "../types.ts";
import type { RewritePhaseResult } from "./rewrite.ts";

type OutputPhaseInput = {
  request: SubstitutionRequest;
  rewrite: RewritePhaseResult;
  elapsedMs: number;
};

export function buildRunSummary(input: OutputPhaseInput): RunSummary {
  let filesMatched = 0;
  let filesWritten = 0;
  let totalMatches = 0;
  for (const outcome of input.rewrite.files) {
    if (outcome.matched) {
      filesMatched += 1;
    }
    if (outcome.written) {
      filesWritten += 1;
    }
    totalMatches += outcome.matchCount;
  }

  return {
    rootDirectory: input.request.rootDirectory,
    pattern: input.request.searchPattern,
    replacement: input.request.replacementTemplate,
    force: input.request.force,
    filesVisited: input.rewrite.files.length,
    filesMatched,
    filesWritten,
    totalMatches,
    errors: input.rewrite.errors,
    files: input.rewrite.files,
    elapsedMs: input.elapsedMs,
  };
}

export function summaryStatus(summary: RunSummary): RunStatus {
  return summary.errors.length === 0 ? "ok" : "completed-with-errors";
}
