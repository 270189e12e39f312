export * from "./ajv";
export * from "./error";
export * from "./harness-config.schema";
