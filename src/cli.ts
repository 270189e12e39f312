import { getConfig } from "./config";
import { HarnessError } from "./contracts";
import type { ParserPort } from "./harness/port";
import { ProcessParser } from "./harness/providers/process";
import type { LineSink } from "./harness/report";
import { runHarness } from "./harness/run";

export const FATAL_EXIT_CODE = 2;

export type MainDeps = {
  out?: LineSink;
  err?: (message: string) => void;
  /** Defaults to a ProcessParser for the configured executable. */
  port?: ParserPort;
};

const defaultErr = (message: string) => console.error(message);

export function formatFatal(error: unknown): string {
  const message =
    error instanceof HarnessError
      ? error.message
      : error instanceof Error
        ? (error.stack ?? error.message)
        : String(error);
  return `[harness] Fatal: ${message}`;
}

/**
 * One harness invocation: config from `env`, the full run, and the process
 * exit status. Expected failures print a one-line message; anything else
 * prints its stack. Either way the status is 2.
 */
export async function runMain(
  env: Record<string, string | undefined>,
  deps: MainDeps = {}
): Promise<number> {
  const err = deps.err ?? defaultErr;
  try {
    const cfg = getConfig(env);
    const summary = await runHarness(cfg, {
      port: deps.port ?? new ProcessParser(cfg.parserPath),
      out: deps.out,
      log: (message) => err(`[harness] ${message}`)
    });
    return summary.exitCode;
  } catch (error) {
    err(formatFatal(error));
    return FATAL_EXIT_CODE;
  }
}
