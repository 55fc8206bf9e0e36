#!/usr/bin/env node
// src/cli.ts
import { runCli } from './cli/program.js';

process.exitCode = await runCli(process.argv.slice(2), {
  env: process.env,
  writeOut: text => process.stdout.write(text),
  writeErr: text => process.stderr.write(text),
});
