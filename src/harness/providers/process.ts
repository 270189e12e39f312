import { spawn } from "node:child_process";
import { closeSync, openSync } from "node:fs";
import type { CaptureOutcome, CaptureRequest, ParserPort } from "../port";

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Local subprocess provider. stdout and stderr share one file descriptor, so
 * the capture interleaves both streams in write order like `> out 2>&1`.
 */
export class ProcessParser implements ParserPort {
  readonly provider = "process";

  constructor(
    private readonly parserPath: string,
    private readonly cwd: string = process.cwd()
  ) {}

  async capture(req: CaptureRequest): Promise<CaptureOutcome> {
    let outputFd: number;
    try {
      outputFd = openSync(req.capturePath, "w");
    } catch (error) {
      return { kind: "capture-failed", error: toError(error) };
    }
    try {
      let inputFd: number;
      try {
        inputFd = openSync(req.fixturePath, "r");
      } catch (error) {
        return { kind: "input-missing", error: toError(error) };
      }
      try {
        return await this.spawnWith(inputFd, outputFd, req.timeoutMs);
      } finally {
        closeSync(inputFd);
      }
    } finally {
      closeSync(outputFd);
    }
  }

  private spawnWith(inputFd: number, outputFd: number, timeoutMs: number): Promise<CaptureOutcome> {
    return new Promise<CaptureOutcome>((resolve) => {
      let settled = false;
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (outcome: CaptureOutcome) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(outcome);
      };

      const child = spawn(this.parserPath, [], {
        cwd: this.cwd,
        stdio: [inputFd, outputFd, outputFd]
      });

      child.once("error", (error) => settle({ kind: "launch-failed", error }));
      child.once("close", (exitCode, signal) => {
        if (timedOut) {
          settle({ kind: "timed-out", timeoutMs });
          return;
        }
        settle({ kind: "exited", exitCode, signal });
      });

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill("SIGKILL");
        }, timeoutMs);
      }
    });
  }
}
