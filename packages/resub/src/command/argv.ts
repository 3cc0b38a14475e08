import type { ReplaceCommandFlags } from "./flags.ts";

export type ParsedCliArguments =
  | { kind: "help" }
  | { kind: "version" }
  | {
      kind: "run";
      flags: ReplaceCommandFlags;
      directory: string;
      pattern: string;
      replacement: string;
    };

export class UsageError extends Error {
  readonly name = "UsageError";

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

type BooleanFlag = "force" | "verbose" | "ignore-case" | "multiline" | "json" | "no-color";
type ListFlag = "extensions" | "exclude";

const BOOLEAN_FLAGS: Record<string, BooleanFlag> = {
  "--force": "force",
  "--verbose": "verbose",
  "--ignore-case": "ignore-case",
  "--multiline": "multiline",
  "--json": "json",
  "--no-color": "no-color",
};

const SHORT_BOOLEAN_FLAGS: Record<string, BooleanFlag> = {
  f: "force",
  v: "verbose",
  i: "ignore-case",
  m: "multiline",
};

const LIST_FLAGS: Record<string, ListFlag> = {
  "-e": "extensions",
  "--extensions": "extensions",
  "--exclude": "exclude",
};

export const HELP_TEXT = [
  "resub - regex substitution across a directory tree",
  "",
  "Usage:",
  "  resub [flags] <directory> <pattern> <replacement>",
  "",
  "Flags:",
  "  -h, --help                 Print this help and exit",
  "  -V, --version              Print the version and exit",
  "  -f, --force                Rewrite every visited file, even without a match",
  "  -v, --verbose              Print one line per visited file",
  "  -e, --extensions <ext...>  Extensions to visit, without the dot (default: all)",
  "  -i, --ignore-case          Match the pattern case-insensitively",
  "  -m, --multiline            Let ^ and $ match at line boundaries",
  "      --exclude <dir...>     Directory names to skip",
  "      --json                 Output the run summary as JSON",
  "      --no-color             Disable colored output",
  "",
  "A list flag takes every following token up to the next flag; end it with --",
  "when the positional arguments come after it.",
  "",
  "Replacement references: \\1 \\g<1> \\g<name> $1 $<name> $& (whole match) $$ (dollar)",
  "A $ that names no group of the pattern is written as is.",
  "",
  "Exit codes: 0 success, 1 completed with file errors, 2 invalid invocation",
  "",
].join("\n");

/**
 * Scans argv for the bin. Help and version win over everything else, so
 * `resub -V` needs no positional arguments. A list flag takes the tokens that
 * follow it up to the next token starting with "-"; `--` ends flag parsing.
 */
export function parseCliArguments(argv: readonly string[]): ParsedCliArguments {
  const flagTokens = argv.includes("--") ? argv.slice(0, argv.indexOf("--")) : argv;
  if (flagTokens.includes("-h") || flagTokens.includes("--help")) {
    return { kind: "help" };
  }
  if (flagTokens.includes("-V") || flagTokens.includes("--version")) {
    return { kind: "version" };
  }

  const flags: ReplaceCommandFlags = {};
  const lists: Record<ListFlag, string[]> = { extensions: [], exclude: [] };
  const seenLists = new Set<ListFlag>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === undefined) {
      continue;
    }

    if (token === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }

    if (!token.startsWith("-") || token === "-") {
      positional.push(token);
      continue;
    }

    const booleanFlag = BOOLEAN_FLAGS[token];
    if (booleanFlag) {
      flags[booleanFlag] = true;
      continue;
    }

    const eqIndex = token.indexOf("=");
    const flagName = eqIndex >= 0 ? token.slice(0, eqIndex) : token;
    const listFlag = LIST_FLAGS[flagName];
    if (listFlag) {
      seenLists.add(listFlag);
      if (eqIndex >= 0) {
        lists[listFlag].push(...splitListValue(token.slice(eqIndex + 1)));
        continue;
      }
      while (i + 1 < argv.length) {
        const next = argv[i + 1];
        if (next === undefined || next.startsWith("-")) {
          break;
        }
        lists[listFlag].push(...splitListValue(next));
        i += 1;
      }
      continue;
    }

    if (!token.startsWith("--")) {
      for (const letter of token.slice(1)) {
        const shortFlag = SHORT_BOOLEAN_FLAGS[letter];
        if (!shortFlag) {
          throw new UsageError(`Unknown flag: -${letter}`);
        }
        flags[shortFlag] = true;
      }
      continue;
    }

    throw new UsageError(`Unknown flag: ${token}`);
  }

  if (seenLists.has("extensions")) {
    flags.extensions = lists.extensions;
  }
  if (seenLists.has("exclude")) {
    flags.exclude = lists.exclude;
  }

  const [directory, pattern, replacement, ...extra] = positional;
  if (directory === undefined || pattern === undefined || replacement === undefined) {
    throw new UsageError("Expected <directory> <pattern> <replacement>.");
  }
  if (extra.length > 0) {
    throw new UsageError(`Too many positional arguments: ${extra.join(" ")}`);
  }

  return { kind: "run", flags, directory, pattern, replacement };
}

function splitListValue(value: string): string[] {
  return value.split(",").filter((part) => part.length > 0);
}
