#!/usr/bin/env node
/**
 * CLI entry point for depship.
 */

import { runCli } from "./program.js";

process.exitCode = await runCli(process.argv);
