#!/usr/bin/env tsx
import { runCli } from "./run.ts";

process.exitCode = runCli(process.argv.slice(2));
