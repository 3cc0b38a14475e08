import { stdout as processStdout } from "node:process";
import { buildCommand } from "@stricli/core";
import {
  replaceCommandFlagAliases,
  replaceCommandFlagParameters,
  type ReplaceCommandFlags,
} from "./command/flags.ts";
import { formatRunOutput, toRunSummaryJson } from "./command/output.ts";
import { summaryStatus } from "./phases/output.ts";
import { replaceInTree } from "./resub.ts";
import type { FileProcessorFs, RunSummary } from "./types.ts";

export const ExitCode = {
  Success: 0,
  CompletedWithErrors: 1,
  Fatal: 2,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

type RunReplaceCommandOptions = {
  /**
   * Base for resolving a relative directory argument. Defaults to the process cwd.
   */
  cwd?: string;
  /**
   * Optional logger override. Defaults to stdout when --verbose is enabled.
   */
  logger?: (line: string) => void;
  fs?: FileProcessorFs;
};

type CommandOutput = {
  write(s: string): void;
  isTTY?: boolean;
};

export function runReplaceCommand(
  directory: string,
  pattern: string,
  replacement: string,
  flags: ReplaceCommandFlags,
  options: RunReplaceCommandOptions = {},
): RunSummary {
  const verbose = flags.verbose ?? false;
  const logger =
    options.logger ?? (verbose ? (line: string) => processStdout.write(`${line}\n`) : undefined);

  return replaceInTree(directory, pattern, replacement, {
    cwd: options.cwd,
    extensions: flags.extensions,
    excludedDirectories: flags.exclude,
    ignoreCase: flags["ignore-case"],
    multiline: flags.multiline,
    force: flags.force,
    verbose,
    logger,
    fs: options.fs,
  });
}

export function writeRunOutput(
  stdout: CommandOutput,
  summary: RunSummary,
  flags: ReplaceCommandFlags,
): void {
  if (flags.json ?? false) {
    stdout.write(`${JSON.stringify(toRunSummaryJson(summary), null, 2)}\n`);
    return;
  }

  const output = formatRunOutput(summary, {
    isTTY: Boolean(stdout.isTTY),
    noColor: flags["no-color"],
  });
  stdout.write(`${output}\n`);
}

export function exitCodeForSummary(summary: RunSummary): ExitCodeValue {
  return summaryStatus(summary) === "ok" ? ExitCode.Success : ExitCode.CompletedWithErrors;
}

export const replaceCommand = buildCommand({
  func(
    this: { process: { stdout: CommandOutput } },
    flags: ReplaceCommandFlags,
    directory: string,
    pattern: string,
    replacement: string,
  ) {
    const stdout = this.process.stdout;
    const summary = runReplaceCommand(directory, pattern, replacement, flags, {
      logger: (flags.verbose ?? false) ? (line: string) => stdout.write(`${line}\n`) : undefined,
    });
    writeRunOutput(stdout, summary, flags);

    if (summaryStatus(summary) !== "ok") {
      throw new Error(
        `Completed with ${summary.errors.length} file ${summary.errors.length === 1 ? "error" : "errors"}.`,
      );
    }
  },
  parameters: {
    flags: replaceCommandFlagParameters,
    aliases: replaceCommandFlagAliases,
    positional: {
      kind: "tuple" as const,
      parameters: [
        {
          brief: "Root directory to search",
          placeholder: "directory",
          parse: (input: string) => input,
        },
        {
          brief: "Search pattern (regular expression)",
          placeholder: "pattern",
          parse: (input: string) => input,
        },
        {
          brief: "Replacement template (\\1, \\g<name>, $1, $<name>)",
          placeholder: "replacement",
          parse: (input: string) => input,
        },
      ],
    },
  },
  docs: {
    brief: "Replace a regex pattern in every matching file under a directory",
  },
});
