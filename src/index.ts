export { getConfig, type HarnessConfig } from "./config";
export { FATAL_EXIT_CODE, formatFatal, runMain, type MainDeps } from "./cli";
export * from "./contracts/error";
export { discoverFixtures } from "./harness/discover";
export { runCase, type CaseResult } from "./harness/case-runner";
export { classifyOutput, findMarkerLine, type Verdict } from "./harness/classify";
export { RunSummary, type CaseOutcome } from "./harness/summary";
export { formatFailureNotice, formatSummaryLine, type LineSink } from "./harness/report";
export { resolveOutcome, runHarness, type HarnessDeps } from "./harness/run";
export { ScratchArea, withScratchArea } from "./harness/scratch";
export type { CaptureOutcome, CaptureRequest, ParserPort } from "./harness/port";
export { ProcessParser } from "./harness/providers/process";
