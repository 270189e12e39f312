import { mkdtempSync, rmSync } from "node:fs";
import { join, resolve } from "node:path";
import { ScratchSetupError } from "../contracts";

export const SCRATCH_PREFIX = ".harness-scratch-";

/**
 * Per-run scratch directory. Every fixture captures into its own file so no
 * capture is ever overwritten by the next run.
 */
export class ScratchArea {
  private seq = 0;
  private disposed = false;

  private constructor(readonly dir: string) {}

  static create(baseDir: string): ScratchArea {
    try {
      return new ScratchArea(mkdtempSync(join(resolve(baseDir), SCRATCH_PREFIX)));
    } catch (error) {
      throw new ScratchSetupError(baseDir, error);
    }
  }

  nextCapturePath(): string {
    if (this.disposed) {
      throw new Error(`scratch area already disposed: ${this.dir}`);
    }
    this.seq += 1;
    return join(this.dir, `case-${this.seq}.out`);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    rmSync(this.dir, { recursive: true, force: true });
  }
}

export async function withScratchArea<T>(
  baseDir: string,
  fn: (scratch: ScratchArea) => Promise<T>
): Promise<T> {
  const scratch = ScratchArea.create(baseDir);
  try {
    return await fn(scratch);
  } finally {
    scratch.dispose();
  }
}
