#!/usr/bin/env node
import 'dotenv/config';
import { runCli } from './cli';
import { errorMessage } from './utils/errors';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', errorMessage(error));
    process.exitCode = 1;
  });
