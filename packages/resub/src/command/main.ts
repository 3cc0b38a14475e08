import { describeError, isFatalError } from "resub-core";
import { ExitCode, exitCodeForSummary, runReplaceCommand, writeRunOutput } from "../command.ts";
import type { FileProcessorFs } from "../types.ts";
import { readPackageVersion } from "../version.ts";
import { HELP_TEXT, parseCliArguments, UsageError, type ParsedCliArguments } from "./argv.ts";

export type CliIo = {
  stdout: { write(s: string): void; isTTY?: boolean };
  stderr: { write(s: string): void };
  cwd?: string;
  fs?: FileProcessorFs;
};

/**
 * Runs the bin against `argv` (without the node and script entries) and
 * returns the process exit code.
 */
export function main(argv: readonly string[], io: CliIo): number {
  let parsed: ParsedCliArguments;
  try {
    parsed = parseCliArguments(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`Error: ${error.message}\nFor help try: resub --help\n`);
      return ExitCode.Fatal;
    }
    throw error;
  }

  if (parsed.kind === "help") {
    io.stdout.write(HELP_TEXT);
    return ExitCode.Success;
  }
  if (parsed.kind === "version") {
    io.stdout.write(`resub ${readPackageVersion()}\n`);
    return ExitCode.Success;
  }

  const { flags } = parsed;
  try {
    const summary = runReplaceCommand(parsed.directory, parsed.pattern, parsed.replacement, flags, {
      cwd: io.cwd,
      fs: io.fs,
      logger: (flags.verbose ?? false) ? (line: string) => io.stdout.write(`${line}\n`) : undefined,
    });
    writeRunOutput(io.stdout, summary, flags);
    return exitCodeForSummary(summary);
  } catch (error) {
    if (isFatalError(error)) {
      io.stderr.write(`Error: ${describeError(error)}\n`);
      return ExitCode.Fatal;
    }
    throw error;
  }
}
