#!/usr/bin/env node
/**
 * chatgpt-clean CLI - Main entry point
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { Command } from 'commander';
import { version } from '../version.js';
import { registerCoreCommands, registerAdminCommands } from './commands/index.js';
import { reportFailure } from './commands/core.js';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('chatgpt-clean')
    .description('Clean ChatGPT data exports into markdown, JSON and fine-tuning pairs')
    .version(version);

  // Register command groups
  registerCoreCommands(program);
  registerAdminCommands(program);

  return program;
}

/**
 * Whether `scriptPath` (usually `process.argv[1]`) resolves to the module at
 * `moduleUrl`. Installed bins are symlinks, so the path is resolved first.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) return false;
  let realPath: string;
  try {
    realPath = realpathSync(scriptPath);
  } catch {
    // Not a file on disk (e.g. `node -e`)
    return false;
  }
  return pathToFileURL(realPath).href === moduleUrl;
}

// Run CLI when executed directly (not when imported as module)
if (isEntryPoint(process.argv[1], import.meta.url)) {
  createProgram()
    .parseAsync()
    .catch((err: unknown) => reportFailure('chatgpt-clean', err));
}
