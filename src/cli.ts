#!/usr/bin/env node
/**
 * Command-line entry of blocks-check; see ./check-cli for the options.
 */

import { runCheck } from "./check-cli";

function main(): void {
  process.exit(runCheck(process.argv.slice(2)));
}

main();
