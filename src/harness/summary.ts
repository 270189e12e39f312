export type CaseOutcome = "pass" | "fail" | "skip";

export class RunSummary {
  passed = 0;
  failed = 0;
  skipped = 0;
  elapsedMs = 0;
  readonly failures: string[] = [];
  readonly skips: string[] = [];

  record(fixture: string, outcome: CaseOutcome): void {
    switch (outcome) {
      case "pass":
        this.passed += 1;
        break;
      case "fail":
        this.failed += 1;
        this.failures.push(fixture);
        break;
      case "skip":
        this.skipped += 1;
        this.skips.push(fixture);
        break;
    }
  }

  finish(elapsedMs: number): this {
    this.elapsedMs = elapsedMs;
    return this;
  }

  /** Fixtures that produced a verdict; skipped ones are excluded. */
  get processed(): number {
    return this.passed + this.failed;
  }

  get exitCode(): 0 | 1 {
    return this.failed > 0 ? 1 : 0;
  }
}
