#!/usr/bin/env node
/**
 * @fileoverview workitem-hierarchy executable
 *
 * @packageDocumentation
 */

import { runCli } from './main.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
