#!/usr/bin/env node
/**
 * Dashboard assembler CLI
 *   dscr-assembler assemble --payload payload.json --out dscr_dashboard.html
 *   dscr-assembler derive --rules rules/bankRules.json
 *   dscr-assembler extract --source reference_dashboard.html
 */

import { runCli } from "./program.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error(e);
    process.exitCode = 1;
  });
