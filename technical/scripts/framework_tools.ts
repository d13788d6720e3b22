#!/usr/bin/env node
import { runFrameworkToolsCli } from './lib/cli.js';

async function main(): Promise<void> {
  const status = await runFrameworkToolsCli(process.argv.slice(2));
  if (status !== 0) {
    process.exit(status);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
