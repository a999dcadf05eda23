#!/usr/bin/env node
import dotenv from 'dotenv';
import { start } from './app';

// Load environment variables
dotenv.config();

start().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exitCode = 1;
});
