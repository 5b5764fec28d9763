#!/usr/bin/env node
/**
 * Command-line entry point
 */

import { runCli } from './commands/run-cli';

runCli(process.argv.slice(2)).then(
  ({ exitCode, output }) => {
    if (exitCode === 0) {
      console.log(output);
    } else {
      console.error(output);
    }
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
