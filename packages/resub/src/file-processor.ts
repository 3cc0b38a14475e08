import { readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { ReadError, WriteError, type FileError } from "resub-core";
import { substitute, type CompiledPattern } from "./pattern.ts";
import type { FileOutcome, FileProcessorFs } from "./types.ts";

export type ProcessFileOptions = {
  root: string;
  force: boolean;
  verbose?: boolean;
  logger?: (line: string) => void;
  fs?: FileProcessorFs;
};

const defaultFs: FileProcessorFs = {
  readFileSync: (filePath) => readFileSync(filePath),
  writeFileSync: (filePath, data) => writeFileSync(filePath, data, "utf8"),
};

// `ignoreBOM` keeps a leading BOM in the decoded text so it is written back.
const utf8Decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Reads one file, substitutes, and writes the result back when the pattern
 * matched or `force` is set. A forced write happens even when the content is
 * unchanged. Read and write failures are returned in the outcome, never thrown.
 */
export function processFile(
  filePath: string,
  pattern: CompiledPattern,
  options: ProcessFileOptions,
): FileOutcome {
  const fs = options.fs ?? defaultFs;
  const file = toDisplayFilePath(options.root, filePath);

  let content: string;
  try {
    content = decodeContent(fs.readFileSync(filePath));
  } catch (error) {
    return report(options, {
      path: filePath,
      file,
      matched: false,
      matchCount: 0,
      written: false,
      error: new ReadError(filePath, error),
    });
  }

  const { text, count } = substitute(pattern, content);
  const matched = count > 0;
  if (!matched && !options.force) {
    return report(options, { path: filePath, file, matched, matchCount: count, written: false });
  }

  try {
    fs.writeFileSync(filePath, text);
  } catch (error) {
    return report(options, {
      path: filePath,
      file,
      matched,
      matchCount: count,
      written: false,
      error: new WriteError(filePath, error),
    });
  }

  return report(options, { path: filePath, file, matched, matchCount: count, written: true });
}

export function formatOutcomeLine(outcome: FileOutcome): string {
  const parts = [
    outcome.file,
    `matched=${outcome.matched ? "yes" : "no"}`,
    `written=${outcome.written ? "yes" : "no"}`,
  ];
  if (outcome.matched) {
    parts.push(`matches=${outcome.matchCount}`);
  }
  if (outcome.error) {
    parts.push(`error=${describeCause(outcome.error)}`);
  }
  return parts.join(" ");
}

function report(options: ProcessFileOptions, outcome: FileOutcome): FileOutcome {
  if (options.verbose ?? false) {
    options.logger?.(formatOutcomeLine(outcome));
  }
  return outcome;
}

function decodeContent(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    throw new Error("content is not valid UTF-8");
  }
}

function describeCause(error: FileError): string {
  return error.cause instanceof Error ? error.cause.message : String(error.cause);
}

function toDisplayFilePath(root: string, filePath: string): string {
  const relative = path.relative(root, filePath);
  return relative.length > 0 ? relative : path.basename(filePath);
}
