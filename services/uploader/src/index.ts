#!/usr/bin/env node
/**
 * coldpipe
 *
 * Pipes standard input into a freshly created cold-storage archive.
 */

import { runCli } from './cli.js';

runCli(process.argv.slice(2), process.stdin).then((code) => {
  process.exit(code);
});
