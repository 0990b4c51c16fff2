#!/usr/bin/env tsx
/**
 * @ledgerlens/cli — Executable entry point.
 */

import { runCli } from "./run.js";

process.exitCode = runCli(process.argv.slice(2));
