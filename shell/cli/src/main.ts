#!/usr/bin/env tsx

import { join } from 'path';
import { loadEnvFile, SKYCUT_DIR } from './config';
import { run } from './cli';

async function main() {
  loadEnvFile(join(SKYCUT_DIR, 'cli.env'));
  const exitCode = await run(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
