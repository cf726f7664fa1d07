#!/usr/bin/env node

import { runCli } from "./cli.js";
import { getLogger } from "./utils/logger.js";

async function main() {
  const exitCode = await runCli(process.argv.slice(2));
  await getLogger().close();
  process.exit(exitCode);
}

main().catch((err) => {
  console.error("stratum failed:", err);
  process.exit(3);
});
