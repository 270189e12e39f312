export type HarnessErrorCode =
  | "CONFIG"
  | "DISCOVERY"
  | "SCRATCH_SETUP"
  | "SCRATCH_READ"
  | "FIXTURE_GONE"
  | "LAUNCH";

export class HarnessError extends Error {
  constructor(
    public readonly code: HarnessErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "HarnessError";
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export class ConfigError extends HarnessError {
  constructor(message: string, cause?: unknown) {
    super("CONFIG", message, cause);
    this.name = "ConfigError";
  }
}

export class DiscoveryError extends HarnessError {
  constructor(
    public readonly dir: string,
    cause: unknown
  ) {
    super("DISCOVERY", `cannot open fixture directory ${dir}: ${describeCause(cause)}`, cause);
    this.name = "DiscoveryError";
  }
}

export class ScratchSetupError extends HarnessError {
  constructor(
    public readonly baseDir: string,
    cause: unknown
  ) {
    super("SCRATCH_SETUP", `cannot create scratch area in ${baseDir}: ${describeCause(cause)}`, cause);
    this.name = "ScratchSetupError";
  }
}

export class ScratchReadError extends HarnessError {
  constructor(
    public readonly fixture: string,
    cause: unknown
  ) {
    super("SCRATCH_READ", `captured output for ${fixture} is unreadable: ${describeCause(cause)}`, cause);
    this.name = "ScratchReadError";
  }
}

export class LaunchError extends HarnessError {
  constructor(
    public readonly fixture: string,
    cause: unknown
  ) {
    super("LAUNCH", `could not run parser on ${fixture}: ${describeCause(cause)}`, cause);
    this.name = "LaunchError";
  }
}

/** The fixture was listed by discovery but could not be opened when its turn came. */
export class FixtureGoneError extends HarnessError {
  constructor(
    public readonly fixture: string,
    cause: unknown
  ) {
    super("FIXTURE_GONE", `fixture ${fixture} is no longer readable: ${describeCause(cause)}`, cause);
    this.name = "FixtureGoneError";
  }
}
