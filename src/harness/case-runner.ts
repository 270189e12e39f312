import { readFileSync, rmSync } from "node:fs";
import { FixtureGoneError, LaunchError, ScratchReadError } from "../contracts";
import type { ParserPort } from "./port";
import type { ScratchArea } from "./scratch";

export type CaseResult =
  | { kind: "captured"; fixture: string; output: string; timedOut: boolean }
  | { kind: "unreadable"; fixture: string; error: ScratchReadError | FixtureGoneError }
  | { kind: "launch-failed"; fixture: string; error: LaunchError };

export type RunCaseOptions = {
  timeoutMs: number;
};

/**
 * Runs one fixture through the parser and reads its capture back synchronously.
 * The capture file is removed before returning, whatever the result.
 */
export async function runCase(
  port: ParserPort,
  fixture: string,
  scratch: ScratchArea,
  options: RunCaseOptions
): Promise<CaseResult> {
  const capturePath = scratch.nextCapturePath();
  try {
    const outcome = await port.capture({
      fixturePath: fixture,
      capturePath,
      timeoutMs: options.timeoutMs
    });
    if (outcome.kind === "launch-failed") {
      return { kind: "launch-failed", fixture, error: new LaunchError(fixture, outcome.error) };
    }
    if (outcome.kind === "input-missing") {
      return { kind: "unreadable", fixture, error: new FixtureGoneError(fixture, outcome.error) };
    }
    if (outcome.kind === "capture-failed") {
      return { kind: "unreadable", fixture, error: new ScratchReadError(fixture, outcome.error) };
    }

    let output: string;
    try {
      output = readFileSync(capturePath, "utf8");
    } catch (error) {
      return { kind: "unreadable", fixture, error: new ScratchReadError(fixture, error) };
    }
    return { kind: "captured", fixture, output, timedOut: outcome.kind === "timed-out" };
  } finally {
    rmSync(capturePath, { force: true });
  }
}
