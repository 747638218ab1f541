#!/usr/bin/env node
// SPDX-License-Identifier: MIT
import 'dotenv/config';
import { run } from './program.js';

const controller = new AbortController();
let interrupted = false;

process.on('SIGINT', () => {
  if (interrupted) {
    process.exit(130);
  }
  interrupted = true;
  process.stderr.write('\nCancelling... press Ctrl-C again to quit immediately\n');
  controller.abort();
});

process.exitCode = await run(process.argv.slice(2), {
  openStdin: () => process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  cwd: process.cwd(),
  signal: controller.signal,
});
process.removeAllListeners('SIGINT');
