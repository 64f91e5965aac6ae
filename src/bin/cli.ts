#!/usr/bin/env node
import { argv } from 'node:process';

import { formatAnyError } from '../utils/format';
import { ExitCode, runCli } from './cli-core';

const supportsColor = process.stdout.isTTY && process.env.NO_COLOR === undefined;

runCli(argv.slice(2), {
  cwd: process.cwd(),
  stdout: process.stdout,
  stderr: process.stderr,
  color: supportsColor,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${formatAnyError(error, false)}\n`);
    process.exitCode = ExitCode.Failure;
  });
