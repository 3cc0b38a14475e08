import path from "node:path";
import { normalizeExtensions } from "resub-core";
import type { ResubOptions, SubstitutionRequest } from "../types.ts";

/**
 * Normalizes caller options into the immutable request the engine runs on.
 * Nothing here touches the filesystem.
 */
export function buildSubstitutionRequest(
  rootDirectory: string,
  searchPattern: string,
  replacementTemplate: string,
  options: ResubOptions = {},
): SubstitutionRequest {
  const cwd = path.resolve(options.cwd ?? process.cwd());

  return Object.freeze({
    rootDirectory: path.resolve(cwd, rootDirectory),
    searchPattern,
    replacementTemplate,
    extensions: normalizeExtensions(options.extensions ?? []),
    excludedDirectories: new Set(
      (options.excludedDirectories ?? []).filter((name) => name.length > 0),
    ),
    ignoreCase: options.ignoreCase ?? false,
    multiline: options.multiline ?? false,
    force: options.force ?? false,
    verbose: options.verbose ?? false,
  });
}
