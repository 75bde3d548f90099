#!/usr/bin/env node
import { buildProgram } from "./cli/program.js";
import { defaultRuntime } from "./runtime.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    defaultRuntime.error(`error: ${String(err)}`);
    defaultRuntime.exit(1);
  });
