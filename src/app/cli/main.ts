#!/usr/bin/env node
// Main CLI entry point for pathpick

import { runCli } from "./cli";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    write: (text) => {
      process.stdout.write(text);
    },
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
