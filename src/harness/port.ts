export type CaptureRequest = {
  fixturePath: string;
  capturePath: string;
  /** 0 disables the timeout. */
  timeoutMs: number;
};

export type CaptureOutcome =
  | { kind: "exited"; exitCode: number | null; signal: NodeJS.Signals | null }
  | { kind: "timed-out"; timeoutMs: number }
  | { kind: "launch-failed"; error: Error }
  /** The fixture could not be opened for stdin; the parser never ran. */
  | { kind: "input-missing"; error: Error }
  /** The capture file could not be created; the parser never ran. */
  | { kind: "capture-failed"; error: Error };

/**
 * Runs the parser-under-test once with the fixture on stdin and its combined
 * stdout/stderr written to `capturePath`.
 */
export interface ParserPort {
  readonly provider: string;
  capture(req: CaptureRequest): Promise<CaptureOutcome>;
}
