#!/usr/bin/env node
import { FATAL_EXIT_CODE, formatFatal, runMain } from "./cli";

runMain(process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(formatFatal(error));
    process.exit(FATAL_EXIT_CODE);
  });
