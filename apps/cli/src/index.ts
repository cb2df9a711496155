#!/usr/bin/env node
import { printErrorLine, printLine } from "@phpstage/stager";

import { UsageError, parseStagingArgs } from "./args.js";
import { runFinalize } from "./commands/finalize.js";
import { runSupply } from "./commands/supply.js";
import { logger } from "./logger.js";

function usage() {
  printLine(
    `phpstage
Usage:
  phpstage supply <build-dir> <cache-dir> <deps-dir> <deps-idx>     Install PHP and httpd, render their config
  phpstage finalize <build-dir> <cache-dir> <deps-dir> <deps-idx>   Write the start script and release descriptor
`
  );
}

async function main() {
  const argv = process.argv.slice(2);
  if (argv.length === 0 || argv[0] === "help" || argv[0] === "--help") {
    usage();
    return;
  }
  const { command, dirs } = parseStagingArgs(argv);
  if (command === "supply") {
    await runSupply(dirs);
    return;
  }
  await runFinalize(dirs);
}

main().catch(error => {
  const err = error instanceof Error ? error : new Error(String(error));
  if (err instanceof UsageError) {
    usage();
  } else {
    logger.error(err);
  }
  printErrorLine("Error:", err.message);
  process.exit(1);
});
