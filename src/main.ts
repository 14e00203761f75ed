#!/usr/bin/env node
/**
 * prefixrun - Run the <integer>-prefixed files of a directory in order
 */

import { runCli } from './core/app/cli.js';
import { shouldUseColor } from './core/ui/colors.js';

runCli(process.argv.slice(2), { color: shouldUseColor() })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
