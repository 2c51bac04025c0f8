#!/usr/bin/env node

import ansis from "ansis";
import { loadConfig } from "./config";
import { Runner } from "./execution/runner";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const config = loadConfig();

  const runner = new Runner();
  process.exitCode = await runner.run(args, config);
}

main().catch((error: unknown) => {
  console.error(ansis.red("Fatal error:"), error);
  process.exitCode = 2;
});
