import { formatSeconds } from "../lib/time";
import type { RunSummary } from "./summary";

export type LineSink = (line: string) => void;

export const stdoutSink: LineSink = (line) => {
  process.stdout.write(`${line}\n`);
};

export function formatFailureNotice(fixture: string): string {
  return ` ❌Failed: ${fixture}`;
}

export function formatSummaryLine(summary: RunSummary): string {
  const skipped = summary.skipped > 0 ? ` (${summary.skipped} skipped)` : "";
  const elapsed = formatSeconds(summary.elapsedMs);
  if (summary.failed === 0) {
    return `✔ Passed ${summary.passed} test cases${skipped} in ${elapsed}`;
  }
  return `Failed ${summary.failed}/${summary.processed} test cases${skipped} in ${elapsed}`;
}
