#!/usr/bin/env npx tsx
import { config } from 'dotenv';
import { runCli } from './cli';

config();

runCli(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[ERROR] Unexpected failure:', error);
    process.exitCode = 1;
  });
