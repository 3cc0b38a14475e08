import chalk, { Chalk, type ChalkInstance } from "chalk";
import { summaryStatus } from "../phases/output.ts";
import type { RunStatus, RunSummary } from "../types.ts";

export type FormatRunOutputOptions = {
  /** Whether the destination is a terminal. Colors are off otherwise. */
  isTTY?: boolean;
  noColor?: boolean;
  chalkInstance?: ChalkInstance;
};

export type RunSummaryJson = {
  status: RunStatus;
  rootDirectory: string;
  pattern: string;
  replacement: string;
  force: boolean;
  filesVisited: number;
  filesMatched: number;
  filesWritten: number;
  totalMatches: number;
  elapsedMs: number;
  errors: Array<{ file: string; kind: "read" | "write"; message: string }>;
  files: Array<{ file: string; matched: boolean; matchCount: number; written: boolean }>;
};

export function formatRunOutput(
  summary: RunSummary,
  options: FormatRunOutputOptions = {},
): string {
  const chalkInstance = options.chalkInstance ?? summaryChalk(options);
  const lines: string[] = [];

  for (const { error } of summary.errors) {
    lines.push(chalkInstance.red(`error: ${error.message}`));
  }

  const parts = [
    `${summary.filesVisited} ${pluralize("file", summary.filesVisited)} visited`,
    `${summary.filesMatched} matched`,
    `${summary.filesWritten} written`,
  ];
  if (summary.errors.length > 0) {
    parts.push(`${summary.errors.length} ${pluralize("error", summary.errors.length)}`);
  }
  const line = `${parts.join(", ")}${summary.force ? " (force)" : ""}`;
  lines.push(summary.errors.length > 0 ? chalkInstance.yellow(line) : chalkInstance.gray(line));

  return lines.join("\n");
}

export function toRunSummaryJson(summary: RunSummary): RunSummaryJson {
  return {
    status: summaryStatus(summary),
    rootDirectory: summary.rootDirectory,
    pattern: summary.pattern,
    replacement: summary.replacement,
    force: summary.force,
    filesVisited: summary.filesVisited,
    filesMatched: summary.filesMatched,
    filesWritten: summary.filesWritten,
    totalMatches: summary.totalMatches,
    elapsedMs: summary.elapsedMs,
    errors: summary.errors.map(({ file, error }) => ({
      file,
      kind: error.kind,
      message: error.message,
    })),
    files: summary.files.map((outcome) => ({
      file: outcome.file,
      matched: outcome.matched,
      matchCount: outcome.matchCount,
      written: outcome.written,
    })),
  };
}

function summaryChalk(options: FormatRunOutputOptions): ChalkInstance {
  if (!(options.isTTY ?? false) || (options.noColor ?? false)) {
    return new Chalk({ level: 0 });
  }
  return new Chalk({ level: chalk.level > 0 ? chalk.level : 1 });
}

function pluralize(word: string, count: number): string {
  return count === 1 ? word : `${word}s`;
}
