import { buildApplication, text_en } from "@stricli/core";
import { describeError, isFatalError } from "resub-core";
import { replaceCommand } from "./command.ts";

// Fatal errors already name the pattern or root, so they print bare.
function describeRunFailure(exc: unknown): string {
  if (isFatalError(exc)) {
    return `Error: ${exc.message}`;
  }
  return `resub failed, Error: ${describeError(exc)}`;
}

const text = {
  ...text_en,
  exceptionWhileParsingArguments: (exc: unknown) =>
    `Unable to parse arguments, Error: ${describeError(exc)}`,
  exceptionWhileRunningCommand: describeRunFailure,
};

export const app = buildApplication(replaceCommand, {
  name: "resub",
  scanner: {
    caseStyle: "original",
  },
  documentation: {
    caseStyle: "original",
  },
  localization: {
    defaultLocale: "en",
    loadText: () => text,
  },
});
