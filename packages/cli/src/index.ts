#!/usr/bin/env node
import { version } from '../package.json';
import { printBanner, printError } from './banner';
import { createCliClient } from './config';
import { EXIT_FAILURE, createProgram } from './program';

printBanner(version);

createProgram(version, (options) => createCliClient(process.env, options))
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    printError(error instanceof Error ? error.message : String(error));
    process.exitCode = EXIT_FAILURE;
  });
