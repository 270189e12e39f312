import type { HarnessConfig } from "../contracts";
import { monotonicMs, type Clock } from "../lib/time";
import { runCase, type CaseResult } from "./case-runner";
import { classifyOutput } from "./classify";
import { discoverFixtures } from "./discover";
import type { ParserPort } from "./port";
import { formatFailureNotice, formatSummaryLine, stdoutSink, type LineSink } from "./report";
import { withScratchArea } from "./scratch";
import { RunSummary, type CaseOutcome } from "./summary";

export type HarnessDeps = {
  port: ParserPort;
  out?: LineSink;
  log?: (message: string) => void;
  clock?: Clock;
};

const defaultLog = (message: string) => console.error(`[harness] ${message}`);

type OutcomePolicy = Pick<HarnessConfig, "errorMarker" | "onUnreadable" | "onLaunchFailure">;

export function resolveOutcome(
  result: CaseResult,
  policy: OutcomePolicy,
  log: (message: string) => void = defaultLog
): CaseOutcome {
  switch (result.kind) {
    case "captured":
      if (result.timedOut) {
        log(`timed out: ${result.fixture}`);
        return "fail";
      }
      return classifyOutput(result.output, policy.errorMarker);
    case "unreadable":
      if (policy.onUnreadable === "skip") {
        log(`skipped: ${result.error.message}`);
        return "skip";
      }
      return "fail";
    case "launch-failed":
      if (policy.onLaunchFailure === "abort") {
        throw result.error;
      }
      log(result.error.message);
      return policy.onLaunchFailure;
  }
}

/**
 * Discovers fixtures, runs each one through the parser in order and prints
 * failure notices as they happen plus one summary line at the end.
 *
 * Throws ScratchSetupError or DiscoveryError before anything is printed when
 * the scratch area cannot be created or the fixture directory cannot be
 * opened, and LaunchError when the launch policy is `abort`. The scratch area
 * is removed on every path.
 */
export async function runHarness(cfg: HarnessConfig, deps: HarnessDeps): Promise<RunSummary> {
  const out = deps.out ?? stdoutSink;
  const log = deps.log ?? defaultLog;
  const clock = deps.clock ?? monotonicMs;

  return withScratchArea(cfg.scratchDir, async (scratch) => {
    const fixtures = discoverFixtures(cfg.fixtureDir, cfg.fixtureMarker);
    const summary = new RunSummary();
    const start = clock();

    for (const fixture of fixtures) {
      const result = await runCase(deps.port, fixture, scratch, { timeoutMs: cfg.timeoutMs });
      const outcome = resolveOutcome(result, cfg, log);
      summary.record(fixture, outcome);
      if (outcome === "fail") {
        out(formatFailureNotice(fixture));
      }
      if (cfg.verbose) {
        log(`${outcome}: ${fixture}`);
      }
    }

    summary.finish(clock() - start);
    out(formatSummaryLine(summary));
    return summary;
  });
}
