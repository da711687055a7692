#!/usr/bin/env node

import { runCli } from './launcher.js';

async function main(): Promise<void> {
  process.exit(await runCli(process.argv.slice(2)));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
