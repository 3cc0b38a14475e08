export {
  fileExtension,
  isCandidateFile,
  normalizeExtension,
  normalizeExtensions,
  walkTree,
} from "./files.ts";
export type { WalkTreeOptions } from "./files.ts";
export {
  describeError,
  InvalidRootError,
  isErrorWithCode,
  isFatalError,
  PatternCompileError,
  ReadError,
  WriteError,
} from "./errors.ts";
export type { FileError } from "./errors.ts";
export { formatMs, startStopwatch } from "./common/trace.ts";
export type { Stopwatch } from "./common/trace.ts";
