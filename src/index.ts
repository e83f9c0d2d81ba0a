#!/usr/bin/env node

/**
 * Vectorizer CLI
 *
 * Commands:
 * - sync: Embed new/changed markdown files and drop deleted ones from the index
 * - search: Query the index by similarity
 */

// Load environment variables from .env files
// .env.local takes precedence over .env
import { existsSync, readFileSync } from 'fs';
import { parse } from 'dotenv';

// Load .env files silently (without dotenv's own logging)
function loadEnvFile(filePath: string, override = false): void {
  if (!existsSync(filePath)) return;
  let parsed: Record<string, string>;
  try {
    parsed = parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    console.error(`[env] Ignoring unreadable ${filePath}: ${String(error)}`);
    return;
  }
  for (const [key, value] of Object.entries(parsed)) {
    if (override || process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

loadEnvFile('.env');
loadEnvFile('.env.local', true);

import { Command } from 'commander';

import { registerSyncCommand } from './cli/commands/sync.js';
import { registerSearchCommand } from './cli/commands/search.js';
import { c } from './cli/colors.js';

const program = new Command();

program
  .name('vectorizer')
  .description('Keep a vector index in sync with a directory of markdown documents')
  .version('0.1.0');

registerSyncCommand(program);
registerSearchCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`\n${c.error('Error')} ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
