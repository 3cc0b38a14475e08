export type ReplaceCommandFlags = {
  force?: boolean;
  verbose?: boolean;
  extensions?: readonly string[];
  exclude?: readonly string[];
  "ignore-case"?: boolean;
  multiline?: boolean;
  json?: boolean;
  "no-color"?: boolean;
};

export const replaceCommandFlagParameters = {
  force: {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Rewrite every visited file, even without a match",
  },
  verbose: {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Print one line per visited file",
  },
  extensions: {
    kind: "parsed" as const,
    optional: true,
    variadic: true as const,
    brief: "File extension to visit, without the dot (repeatable; default: all)",
    placeholder: "ext",
    parse: (input: string) => input,
  },
  exclude: {
    kind: "parsed" as const,
    optional: true,
    variadic: true as const,
    brief: "Directory name to skip (repeatable)",
    placeholder: "dir",
    parse: (input: string) => input,
  },
  "ignore-case": {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Match the pattern case-insensitively",
  },
  multiline: {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Let ^ and $ match at line boundaries",
  },
  json: {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Output the run summary as JSON",
  },
  "no-color": {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Disable colored output",
  },
} as const;

export const replaceCommandFlagAliases = {
  f: "force",
  v: "verbose",
  e: "extensions",
  i: "ignore-case",
  m: "multiline",
} as const;
