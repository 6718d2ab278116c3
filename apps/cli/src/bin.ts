#!/usr/bin/env tsx
/**
 * expense-ledger: record and summarize personal expenses in a local JSON file
 *
 * Reads .env from the working directory before the environment is consulted.
 */

import dotenv from 'dotenv';
import { runCli } from './cli.js';
import { confirm } from './prompt.js';

dotenv.config();

process.exitCode = await runCli(process.argv.slice(2), {
  env: process.env,
  cwd: process.cwd(),
  stdout: process.stdout,
  stderr: process.stderr,
  confirm: process.stdin.isTTY ? confirm : undefined,
});
