#!/usr/bin/env node
/**
 * control-alloc 実行エントリ
 */
import { CLI_NAME, runCli } from './cli/index.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`[${CLI_NAME}] Fatal error:`, err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
