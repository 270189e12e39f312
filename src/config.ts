import {
  assertHarnessConfig,
  ConfigError,
  type HarnessConfig,
  type LaunchFailurePolicy,
  type UnreadablePolicy
} from "./contracts";

export type { HarnessConfig } from "./contracts";

export const DEFAULT_FIXTURE_DIR = "./tests";
export const DEFAULT_PARSER_PATH = "./parser";
export const DEFAULT_FIXTURE_MARKER = ".dcf";
export const DEFAULT_ERROR_MARKER = "Error: syntax error";

type Env = Record<string, string | undefined>;

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || !Number.isInteger(parsed)) {
    throw new ConfigError(`invalid integer env value: ${value}`);
  }
  return parsed;
}

function readBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  const normalized = value.toLowerCase();
  if (normalized === "true" || value === "1") return true;
  if (normalized === "false" || value === "0") return false;
  throw new ConfigError(`invalid boolean env value: ${value}`);
}

function readEnum<T extends string>(
  value: string | undefined,
  fallback: T,
  allowed: readonly T[],
  label: string
): T {
  if (value === undefined || value === "") return fallback;
  const match = allowed.find((candidate) => candidate === value);
  if (match !== undefined) {
    return match;
  }
  throw new ConfigError(`invalid ${label} env value: ${value}`);
}

// Markers are matched verbatim, so only paths get trimmed.
function readPath(value: string | undefined, fallback: string): string {
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function readMarker(value: string | undefined, fallback: string): string {
  if (value === undefined || value === "") return fallback;
  return value;
}

export function getConfig(env: Env = process.env): HarnessConfig {
  const config: HarnessConfig = {
    fixtureDir: readPath(env.HARNESS_FIXTURE_DIR, DEFAULT_FIXTURE_DIR),
    parserPath: readPath(env.HARNESS_PARSER, DEFAULT_PARSER_PATH),
    scratchDir: readPath(env.HARNESS_SCRATCH_DIR, "."),
    fixtureMarker: readMarker(env.HARNESS_FIXTURE_MARKER, DEFAULT_FIXTURE_MARKER),
    errorMarker: readMarker(env.HARNESS_ERROR_MARKER, DEFAULT_ERROR_MARKER),
    timeoutMs: readInt(env.HARNESS_TIMEOUT_MS, 0),
    onUnreadable: readEnum<UnreadablePolicy>(
      env.HARNESS_ON_UNREADABLE,
      "skip",
      ["skip", "fail"],
      "unreadable output policy"
    ),
    onLaunchFailure: readEnum<LaunchFailurePolicy>(
      env.HARNESS_ON_LAUNCH_FAILURE,
      "abort",
      ["abort", "fail", "pass"],
      "launch failure policy"
    ),
    verbose: readBool(env.HARNESS_VERBOSE, false)
  };

  assertHarnessConfig(config);
  return config;
}
