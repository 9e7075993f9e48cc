#!/usr/bin/env node
/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import chalk from "chalk";
import { hideBin } from "yargs/helpers";
import { runCli } from "../src/cli.js";

async function main(): Promise<void> {
  const args = hideBin(process.argv);
  if (!args.includes("--json")) {
    console.log(chalk.blue("layer-migrate"));
  }

  process.exitCode = await runCli(args);
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
