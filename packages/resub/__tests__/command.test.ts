import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { run } from "@stricli/core";
import { Chalk } from "chalk";
import { expect, test } from "vitest";
import { ReadError } from "resub-core";
import { app } from "../src/app.ts";
import { replaceCommand, runReplaceCommand } from "../src/command.ts";
import {
  replaceCommandFlagAliases,
  replaceCommandFlagParameters,
  type ReplaceCommandFlags,
} from "../src/command/flags.ts";
import { formatRunOutput, toRunSummaryJson } from "../src/command/output.ts";
import type { RunSummary } from "../src/types.ts";

type CommandExecutor = (
  this: { process: { stdout: { write(s: string): void; isTTY?: boolean } } },
  flags: ReplaceCommandFlags,
  directory: string,
  pattern: string,
  replacement: string,
) => void;

function resolveReplaceCommandExecutor(): Promise<CommandExecutor> {
  return replaceCommand.loader().then((loaded) => loaded as CommandExecutor);
}

async function withWorkspace(run: (workspace: string) => Promise<void>): Promise<void> {
  const workspace = await mkdtemp(path.join(tmpdir(), "resub-command-"));
  try {
    await run(workspace);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
}

function buildSummary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    rootDirectory: "/virtual",
    pattern: "foo",
    replacement: "bar",
    force: false,
    filesVisited: 3,
    filesMatched: 2,
    filesWritten: 2,
    totalMatches: 4,
    errors: [],
    files: [],
    elapsedMs: 1.5,
    ...overrides,
  };
}

test("runReplaceCommand maps flags onto the run", async () => {
  await withWorkspace(async (workspace) => {
    const html = path.join(workspace, "a.html");
    const text = path.join(workspace, "b.txt");
    await writeFile(html, "Foo foo", "utf8");
    await writeFile(text, "foo", "utf8");

    const summary = runReplaceCommand(workspace, "foo", "bar", {
      extensions: ["html"],
      "ignore-case": true,
    });

    expect(summary.filesVisited).toBe(1);
    expect(summary.totalMatches).toBe(2);
    expect(await readFile(html, "utf8")).toBe("bar bar");
    expect(await readFile(text, "utf8")).toBe("foo");
  });
});

test("runReplaceCommand resolves a relative directory against cwd", async () => {
  await withWorkspace(async (workspace) => {
    await writeFile(path.join(workspace, "a.txt"), "foo", "utf8");

    const summary = runReplaceCommand(".", "foo", "bar", {}, { cwd: workspace });

    expect(summary.rootDirectory).toBe(workspace);
    expect(summary.filesWritten).toBe(1);
  });
});

test("runReplaceCommand sends verbose lines to the provided logger", async () => {
  await withWorkspace(async (workspace) => {
    await writeFile(path.join(workspace, "a.txt"), "foo", "utf8");
    const lines: string[] = [];

    runReplaceCommand(workspace, "foo", "bar", { verbose: true }, {
      logger: (line) => lines.push(line),
    });

    expect(lines[0]).toBe("a.txt matched=yes written=yes matches=1");
    expect(lines).toHaveLength(2);
  });
});

test("replaceCommand writes a plain summary", async () => {
  await withWorkspace(async (workspace) => {
    const file = path.join(workspace, "a.html");
    await writeFile(file, "foo123", "utf8");
    const writes: string[] = [];

    const executor = await resolveReplaceCommandExecutor();
    executor.call(
      { process: { stdout: { write: (s: string) => writes.push(s) } } },
      { extensions: ["html"] },
      workspace,
      "foo(\\d+)",
      "bar\\1",
    );

    expect(writes).toEqual(["1 file visited, 1 matched, 1 written\n"]);
    expect(await readFile(file, "utf8")).toBe("bar123");
  });
});

test("replaceCommand writes JSON when requested", async () => {
  await withWorkspace(async (workspace) => {
    await writeFile(path.join(workspace, "a.html"), "foo123", "utf8");
    const writes: string[] = [];

    const executor = await resolveReplaceCommandExecutor();
    executor.call(
      { process: { stdout: { write: (s: string) => writes.push(s) } } },
      { json: true },
      workspace,
      "foo",
      "bar",
    );

    const parsed = JSON.parse(writes.join("")) as ReturnType<typeof toRunSummaryJson>;
    expect(parsed.status).toBe("ok");
    expect(parsed.files).toEqual([
      { file: "a.html", matched: true, matchCount: 1, written: true },
    ]);
    expect(parsed.errors).toEqual([]);
  });
});

test("replaceCommand throws after printing when a file fails", async () => {
  await withWorkspace(async (workspace) => {
    const file = path.join(workspace, "blob.txt");
    await writeFile(file, Buffer.from([0xff, 0xfe, 0xfd]));
    const writes: string[] = [];

    const executor = await resolveReplaceCommandExecutor();
    expect(() =>
      executor.call(
        { process: { stdout: { write: (s: string) => writes.push(s) } } },
        {},
        workspace,
        "foo",
        "bar",
      ),
    ).toThrow("Completed with 1 file error.");
    expect(writes).toEqual([
      `error: Failed to read ${file}: content is not valid UTF-8\n1 file visited, 0 matched, 0 written, 1 error\n`,
    ]);
  });
});

test("formatRunOutput lists errors before the summary line", () => {
  const error = new ReadError("/virtual/b.txt", new Error("EACCES: permission denied"));
  const summary = buildSummary({
    errors: [{ path: "/virtual/b.txt", file: "b.txt", error }],
  });

  expect(formatRunOutput(summary)).toBe(
    [
      "error: Failed to read /virtual/b.txt: EACCES: permission denied",
      "3 files visited, 2 matched, 2 written, 1 error",
    ].join("\n"),
  );
});

test("formatRunOutput marks force mode and honors a color instance", () => {
  const summary = buildSummary({ force: true, filesVisited: 1, filesMatched: 0, filesWritten: 1 });

  expect(formatRunOutput(summary)).toBe("1 file visited, 0 matched, 1 written (force)");
  expect(formatRunOutput(summary, { chalkInstance: new Chalk({ level: 1 }) })).toBe(
    "\u001b[90m1 file visited, 0 matched, 1 written (force)\u001b[39m",
  );
});

test("formatRunOutput colors only a terminal without --no-color", () => {
  const summary = buildSummary();
  const plain = "3 files visited, 2 matched, 2 written";

  expect(formatRunOutput(summary, { isTTY: false })).toBe(plain);
  expect(formatRunOutput(summary, { isTTY: true, noColor: true })).toBe(plain);
  expect(formatRunOutput(summary, { isTTY: true })).not.toBe(plain);
  expect(formatRunOutput(summary, { isTTY: true })).toContain(plain);
});

test("toRunSummaryJson flattens errors into plain records", () => {
  const error = new ReadError("/virtual/b.txt", new Error("EACCES: permission denied"));
  const json = toRunSummaryJson(
    buildSummary({ errors: [{ path: "/virtual/b.txt", file: "b.txt", error }] }),
  );

  expect(json.status).toBe("completed-with-errors");
  expect(json.errors).toEqual([
    {
      file: "b.txt",
      kind: "read",
      message: "Failed to read /virtual/b.txt: EACCES: permission denied",
    },
  ]);
});

test("every flag alias points at a declared flag", () => {
  for (const flagName of Object.values(replaceCommandFlagAliases)) {
    expect(Object.keys(replaceCommandFlagParameters)).toContain(flagName);
  }
});

test("app runs the replace command through stricli", async () => {
  await withWorkspace(async (workspace) => {
    const file = path.join(workspace, "a.txt");
    await writeFile(file, "foo", "utf8");
    const out: string[] = [];
    const err: string[] = [];

    await run(app, [workspace, "foo", "bar"], {
      process: {
        stdout: { write: (s: string) => void out.push(s) },
        stderr: { write: (s: string) => void err.push(s) },
      },
    });

    expect(out).toEqual(["1 file visited, 1 matched, 1 written\n"]);
    expect(err).toEqual([]);
    expect(await readFile(file, "utf8")).toBe("bar");
  });
});

test("app prints fatal errors without a wrapper", async () => {
  await withWorkspace(async (workspace) => {
    const missing = path.join(workspace, "missing");
    const out: string[] = [];
    const err: string[] = [];

    await run(app, [missing, "foo", "bar"], {
      process: {
        stdout: { write: (s: string) => void out.push(s) },
        stderr: { write: (s: string) => void err.push(s) },
      },
    });

    expect(out).toEqual([]);
    expect(err.join("")).toContain(
      `Error: Invalid root directory ${missing}: directory does not exist`,
    );
    expect(err.join("")).not.toContain("resub failed");
  });
});
