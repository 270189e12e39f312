import { chmodSync, existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { ProcessParser } from "../../src/harness/providers/process";
import { runHarness } from "../../src/harness/run";
import { ScratchArea } from "../../src/harness/scratch";
import { configFor, createWorkspace, scratchLeftovers, type Workspace } from "../helpers/workspace";

function writeScript(ws: Workspace, name: string, body: string): string {
  const path = join(ws.root, name);
  writeFileSync(path, `#!/bin/sh\n${body}\n`);
  chmodSync(path, 0o755);
  return path;
}

// Stand-in parser: rejects any input containing "}}" and reports on stderr.
const GRAMMAR_STUB = [
  "input=$(cat)",
  'case "$input" in',
  '  *"}}"*) echo "Error: syntax error: unexpected token" 1>&2 ;;',
  "  *) echo OK ;;",
  "esac"
].join("\n");

describe("process parser", () => {
  let ws: Workspace | undefined;
  let scratch: ScratchArea | undefined;

  afterEach(() => {
    scratch?.dispose();
    ws?.cleanup();
    scratch = undefined;
    ws = undefined;
  });

  test("pipes the fixture to stdin and interleaves stdout and stderr", async () => {
    ws = createWorkspace({ "ok.dcf": "package Test;\n" });
    scratch = ScratchArea.create(ws.root);
    const parser = writeScript(ws, "parser", "echo out1\necho err1 1>&2\ncat\necho err2 1>&2\nexit 3");
    const capturePath = scratch.nextCapturePath();

    const outcome = await new ProcessParser(parser).capture({
      fixturePath: join(ws.fixtureDir, "ok.dcf"),
      capturePath,
      timeoutMs: 0
    });

    expect(outcome).toEqual({ kind: "exited", exitCode: 3, signal: null });
    expect(readFileSync(capturePath, "utf8")).toBe("out1\nerr1\npackage Test;\nerr2\n");
  });

  test("a missing executable is a launch failure", async () => {
    ws = createWorkspace({ "ok.dcf": "" });
    scratch = ScratchArea.create(ws.root);

    const outcome = await new ProcessParser(join(ws.root, "no-such-parser")).capture({
      fixturePath: join(ws.fixtureDir, "ok.dcf"),
      capturePath: scratch.nextCapturePath(),
      timeoutMs: 0
    });

    expect(outcome.kind).toBe("launch-failed");
    if (outcome.kind !== "launch-failed") return;
    expect(outcome.error.message).toContain("ENOENT");
  });

  test("a fixture that vanished before its run never reaches the parser", async () => {
    ws = createWorkspace();
    scratch = ScratchArea.create(ws.root);
    const parser = writeScript(ws, "parser", `touch ${join(ws.root, "ran")}`);

    const outcome = await new ProcessParser(parser).capture({
      fixturePath: join(ws.fixtureDir, "gone.dcf"),
      capturePath: scratch.nextCapturePath(),
      timeoutMs: 0
    });

    expect(outcome.kind).toBe("input-missing");
    if (outcome.kind !== "input-missing") return;
    expect(outcome.error.message).toContain("ENOENT");
    expect(existsSync(join(ws.root, "ran"))).toBe(false);
  });

  test("an uncreatable capture file is reported instead of thrown", async () => {
    ws = createWorkspace({ "ok.dcf": "" });
    const parser = writeScript(ws, "parser", "cat");

    const outcome = await new ProcessParser(parser).capture({
      fixturePath: join(ws.fixtureDir, "ok.dcf"),
      capturePath: join(ws.root, "no-such-dir", "case-1.out"),
      timeoutMs: 0
    });

    expect(outcome.kind).toBe("capture-failed");
  });

  test("kills a parser that outlives the timeout", async () => {
    ws = createWorkspace({ "hang.dcf": "" });
    scratch = ScratchArea.create(ws.root);
    const parser = writeScript(ws, "parser", "echo started\nexec sleep 30");
    const capturePath = scratch.nextCapturePath();

    const outcome = await new ProcessParser(parser).capture({
      fixturePath: join(ws.fixtureDir, "hang.dcf"),
      capturePath,
      timeoutMs: 200
    });

    expect(outcome).toEqual({ kind: "timed-out", timeoutMs: 200 });
    expect(readFileSync(capturePath, "utf8")).toBe("started\n");
  });
});

describe("harness against a real subprocess", () => {
  let ws: Workspace | undefined;

  afterEach(() => {
    ws?.cleanup();
    ws = undefined;
  });

  test("classifies passing and failing fixtures end to end", async () => {
    ws = createWorkspace({
      "ok.dcf": "package A; class M { }",
      "bad.dcf": "package B; class M { }}",
      "notes.txt": "}}"
    });
    const parserPath = writeScript(ws, "parser", GRAMMAR_STUB);
    const lines: string[] = [];

    const summary = await runHarness(configFor(ws, { parserPath }), {
      port: new ProcessParser(parserPath),
      out: (line) => lines.push(line)
    });

    expect([summary.passed, summary.failed]).toEqual([1, 1]);
    expect(summary.exitCode).toBe(1);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe(` ❌Failed: ${join(ws.fixtureDir, "bad.dcf")}`);
    expect(lines[1]).toMatch(/^Failed 1\/2 test cases in \d+\.\d{6}s$/);
    expect(scratchLeftovers(ws.root)).toEqual([]);
  });

  test("all-pass run exits cleanly", async () => {
    ws = createWorkspace({ "ok.dcf": "package A;" });
    const parserPath = writeScript(ws, "parser", GRAMMAR_STUB);
    const lines: string[] = [];

    const summary = await runHarness(configFor(ws, { parserPath }), {
      port: new ProcessParser(parserPath),
      out: (line) => lines.push(line)
    });

    expect(summary.exitCode).toBe(0);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^✔ Passed 1 test cases in \d+\.\d{6}s$/);
  });

  test("fixtures deleted mid-run are skipped and the run still finishes", async () => {
    ws = createWorkspace({ "a.dcf": "package A;", "b.dcf": "package B;" });
    // Whichever fixture runs first deletes every fixture, including the other one.
    const parserPath = writeScript(
      ws,
      "parser",
      `cat >/dev/null\nrm -f ${ws.fixtureDir}/*.dcf\necho OK`
    );
    const lines: string[] = [];
    const logs: string[] = [];

    const summary = await runHarness(configFor(ws, { parserPath }), {
      port: new ProcessParser(parserPath),
      out: (line) => lines.push(line),
      log: (message) => logs.push(message)
    });

    expect([summary.passed, summary.failed, summary.skipped]).toEqual([1, 0, 1]);
    expect(summary.exitCode).toBe(0);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^✔ Passed 1 test cases \(1 skipped\) in \d+\.\d{6}s$/);
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatch(/^skipped: fixture .*\.dcf is no longer readable: ENOENT/);
    expect(scratchLeftovers(ws.root)).toEqual([]);
  });

  test("a crashing parser without the marker still passes", async () => {
    ws = createWorkspace({ "crash.dcf": "anything" });
    const parserPath = writeScript(ws, "parser", "echo 'Segmentation fault' 1>&2\nexit 139");

    const summary = await runHarness(configFor(ws, { parserPath }), {
      port: new ProcessParser(parserPath),
      out: () => undefined
    });

    expect([summary.passed, summary.failed]).toEqual([1, 0]);
  });
});
