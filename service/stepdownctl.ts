#!/usr/bin/env -S node --import tsx

import pc from "picocolors";
import { CLI, failureOf } from "../lib/cli.ts";

try {
  await new CLI().cli().parseAsync(process.argv);
} catch (error) {
  const { code, message } = failureOf(error);
  console.error(code === 1 ? pc.red(message) : message);
  process.exitCode = code;
}
