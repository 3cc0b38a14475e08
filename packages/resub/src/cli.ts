#!/usr/bin/env tsx
import { main } from "./command/main.ts";

process.exitCode = main(process.argv.slice(2), {
  stdout: process.stdout,
  stderr: process.stderr,
});
