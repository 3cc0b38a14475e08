import type { FileError } from "resub-core";

export type ResubOptions = {
  /**
   * Base for resolving a relative root directory. Defaults to `process.cwd()`.
   */
  cwd?: string;
  /**
   * Extension tokens, with or without a leading dot. Empty or omitted means
   * every file is visited.
   */
  extensions?: readonly string[];
  excludedDirectories?: readonly string[];
  ignoreCase?: boolean;
  multiline?: boolean;
  /**
   * Rewrite every visited file, even when the pattern did not match.
   */
  force?: boolean;
  /**
   * Emit one line per visited file, plus a closing summary line, to `logger`.
   */
  verbose?: boolean;
  logger?: (line: string) => void;
  fs?: FileProcessorFs;
};

export type SubstitutionRequest = Readonly<{
  rootDirectory: string;
  searchPattern: string;
  replacementTemplate: string;
  extensions: ReadonlySet<string>;
  excludedDirectories: ReadonlySet<string>;
  ignoreCase: boolean;
  multiline: boolean;
  force: boolean;
  verbose: boolean;
}>;

export type FileProcessorFs = {
  readFileSync: (path: string) => Uint8Array;
  writeFileSync: (path: string, data: string) => void;
};

export type FileOutcome = {
  path: string;
  /** Path relative to the root directory. */
  file: string;
  matched: boolean;
  matchCount: number;
  written: boolean;
  error?: FileError;
};

export type RunError = {
  path: string;
  file: string;
  error: FileError;
};

export type RunSummary = {
  rootDirectory: string;
  pattern: string;
  replacement: string;
  force: boolean;
  filesVisited: number;
  filesMatched: number;
  filesWritten: number;
  totalMatches: number;
  errors: RunError[];
  files: FileOutcome[];
  elapsedMs: number;
};

export type RunStatus = "ok" | "completed-with-errors";
