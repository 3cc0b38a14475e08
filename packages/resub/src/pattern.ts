import { describeError, PatternCompileError } from "resub-core";
import {
  compileReplacementTemplate,
  renderCompiledTemplate,
  type CompiledReplacementTemplate,
} from "./template.ts";

export type CompilePatternOptions = {
  ignoreCase?: boolean;
  multiline?: boolean;
};

export type CompiledPattern = Readonly<{
  source: string;
  flags: string;
  regex: RegExp;
  template: CompiledReplacementTemplate;
  groupCount: number;
  groupNames: readonly string[];
}>;

export type SubstitutionResult = {
  text: string;
  count: number;
};

/**
 * Compiles the search pattern and its replacement template once. Both the
 * regex syntax and the template's group references are checked here, so a
 * compiled pattern never fails during substitution.
 */
export function compilePattern(
  source: string,
  replacement: string,
  options: CompilePatternOptions = {},
): CompiledPattern {
  const flags = buildFlags(options);

  let regex: RegExp;
  let probe: RegExpExecArray | null;
  try {
    regex = new RegExp(source, flags);
    // An empty alternative always matches, exposing every group slot.
    probe = new RegExp(`(?:${source})|`, flags).exec("");
  } catch (error) {
    throw new PatternCompileError(source, describeError(error));
  }

  const groupCount = probe ? probe.length - 1 : 0;
  const groupNames = Object.keys(probe?.groups ?? {});

  let template: CompiledReplacementTemplate;
  try {
    template = compileReplacementTemplate(replacement, { count: groupCount, names: groupNames });
  } catch (error) {
    throw new PatternCompileError(
      source,
      `replacement ${JSON.stringify(replacement)} is invalid: ${describeError(error)}`,
    );
  }

  return Object.freeze({
    source,
    flags,
    regex,
    template,
    groupCount,
    groupNames: Object.freeze(groupNames),
  });
}

/**
 * Replaces every non-overlapping match, left to right. An empty match moves
 * the search forward by one code point.
 */
export function substitute(pattern: CompiledPattern, content: string): SubstitutionResult {
  const parts: string[] = [];
  let cursor = 0;
  let count = 0;

  // matchAll iterates over a clone, leaving `pattern.regex.lastIndex` untouched.
  for (const match of content.matchAll(pattern.regex)) {
    const start = match.index ?? cursor;
    parts.push(content.slice(cursor, start));
    parts.push(renderCompiledTemplate(pattern.template, match));
    cursor = start + match[0].length;
    count += 1;
  }

  if (count === 0) {
    return { text: content, count };
  }

  parts.push(content.slice(cursor));
  return { text: parts.join(""), count };
}

function buildFlags(options: CompilePatternOptions): string {
  let flags = "g";
  if (options.ignoreCase ?? false) {
    flags += "i";
  }
  if (options.multiline ?? false) {
    flags += "m";
  }
  // Code point matching; without it a match can split a surrogate pair.
  return `${flags}u`;
}
