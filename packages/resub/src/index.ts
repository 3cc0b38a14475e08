export { replaceInTree, runSubstitution } from "./resub.ts";
export type { RunSubstitutionOptions } from "./resub.ts";
export { compilePattern, substitute } from "./pattern.ts";
export type { CompiledPattern, CompilePatternOptions, SubstitutionResult } from "./pattern.ts";
export { processFile, formatOutcomeLine } from "./file-processor.ts";
export type { ProcessFileOptions } from "./file-processor.ts";
export { buildSubstitutionRequest } from "./phases/request.ts";
export { summaryStatus } from "./phases/output.ts";
export type {
  FileOutcome,
  FileProcessorFs,
  ResubOptions,
  RunError,
  RunStatus,
  RunSummary,
  SubstitutionRequest,
} from "./types.ts";
export {
  InvalidRootError,
  PatternCompileError,
  ReadError,
  WriteError,
  walkTree,
} from "resub-core";

export { app } from "./app.ts";
export {
  ExitCode,
  exitCodeForSummary,
  replaceCommand,
  runReplaceCommand,
} from "./command.ts";
export { formatRunOutput, toRunSummaryJson } from "./command/output.ts";
export type { ReplaceCommandFlags } from "./command/flags.ts";
export { main } from "./command/main.ts";
