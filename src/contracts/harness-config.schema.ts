import type { JSONSchemaType, ValidateFunction } from "ajv";
import { ajv } from "./ajv";
import { ConfigError } from "./error";

export type UnreadablePolicy = "skip" | "fail";
export type LaunchFailurePolicy = "abort" | "fail" | "pass";

export type HarnessConfig = {
  fixtureDir: string;
  parserPath: string;
  scratchDir: string;
  fixtureMarker: string;
  errorMarker: string;
  timeoutMs: number;
  onUnreadable: UnreadablePolicy;
  onLaunchFailure: LaunchFailurePolicy;
  verbose: boolean;
};

/** Largest delay `setTimeout` honours; anything above it fires after 1ms. */
export const MAX_TIMER_MS = 2147483647;

const harnessConfigSchema: JSONSchemaType<HarnessConfig> = {
  $id: "HarnessConfig.v1",
  type: "object",
  additionalProperties: false,
  required: [
    "fixtureDir",
    "parserPath",
    "scratchDir",
    "fixtureMarker",
    "errorMarker",
    "timeoutMs",
    "onUnreadable",
    "onLaunchFailure",
    "verbose"
  ],
  properties: {
    fixtureDir: { type: "string", minLength: 1 },
    parserPath: { type: "string", minLength: 1 },
    scratchDir: { type: "string", minLength: 1 },
    fixtureMarker: { type: "string", minLength: 1 },
    errorMarker: { type: "string", minLength: 1 },
    timeoutMs: { type: "integer", minimum: 0, maximum: MAX_TIMER_MS },
    onUnreadable: { type: "string", enum: ["skip", "fail"] },
    onLaunchFailure: { type: "string", enum: ["abort", "fail", "pass"] },
    verbose: { type: "boolean" }
  }
};

const validateHarnessConfig: ValidateFunction<HarnessConfig> = ajv.compile(harnessConfigSchema);

export function assertHarnessConfig(value: unknown): asserts value is HarnessConfig {
  if (validateHarnessConfig(value)) return;
  const reason = ajv.errorsText(validateHarnessConfig.errors, { separator: "; " });
  throw new ConfigError(`invalid HarnessConfig: ${reason}`, validateHarnessConfig.errors ?? []);
}
