/**
 * Core CLI commands
 * clean, inspect
 */

import { Command } from 'commander';
import { CleanerError } from '../../errors.js';
import { ConfigError, getConfig, setConfig, type Config } from '../../config/index.js';
import { resetLogger } from '../../utils/logger.js';
import { getConversationStats } from '../../ingest/chatgpt/parser.js';
import { loadExport, runCleaner, type CleanProgress } from '../../pipeline/clean.js';

/** Options for the clean command */
export interface CleanCommandOptions {
  in: string;
  out?: string;
  markdownDir?: string;
  maxFilenameLength?: string;
  markdown: boolean;
  dryRun?: boolean;
  logLevel?: Config['logLevel'];
}

/** Options for the inspect command */
export interface InspectOptions {
  in: string;
  limit?: string;
  json?: boolean;
}

/**
 * Print a fatal error and mark the process as failed
 */
export function reportFailure(action: string, err: unknown): void {
  if (err instanceof CleanerError || err instanceof ConfigError) {
    console.error(`${action}: ${err.message}`);
  } else {
    console.error(`${action}:`, err);
  }
  process.exitCode = 1;
}

function renderProgress(progress: CleanProgress): void {
  if (!process.stdout.isTTY) return;

  if (progress.phase === 'reading') {
    process.stdout.write('\rReading export...');
  } else if (progress.phase === 'parsing') {
    process.stdout.write(`\rParsing conversations: ${progress.current}/${progress.total}`);
  } else if (progress.phase === 'writing') {
    process.stdout.write('\r' + ' '.repeat(80) + '\rWriting files...');
  } else if (progress.phase === 'complete') {
    process.stdout.write('\r' + ' '.repeat(80) + '\r');
  }
}

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Register core commands on the program
 */
export function registerCoreCommands(program: Command): void {
  // Clean command
  program
    .command('clean')
    .description('Convert an export into markdown, consolidated JSON and JSONL pairs')
    .requiredOption('--in <path>', 'Path to conversations.json or the export ZIP')
    .option('--out <dir>', 'Output folder for cleaned exports')
    .option('--markdown-dir <name>', 'Subfolder for per-conversation markdown')
    .option('--max-filename-length <n>', 'Maximum markdown filename length')
    .option('--no-markdown', 'Skip per-conversation markdown files')
    .option('--dry-run', 'Parse and report without writing files')
    .option('--log-level <level>', 'Logging verbosity (debug, info, warn, error)')
    .action(async (options: CleanCommandOptions) => {
      try {
        if (options.logLevel) {
          setConfig({ ...getConfig(), logLevel: options.logLevel });
          resetLogger();
        }
        const config = getConfig();
        const dryRun = options.dryRun ?? config.dryRun;

        console.log(`Input: ${options.in}`);
        if (dryRun) console.log('Mode: DRY RUN');

        const result = await runCleaner({
          input: options.in,
          outDir: options.out ?? config.outDir,
          markdownDirName: options.markdownDir ?? config.markdownDirName,
          maxFilenameLength:
            parsePositiveInt(options.maxFilenameLength, '--max-filename-length') ??
            config.maxFilenameLength,
          skipMarkdown: !options.markdown,
          dryRun,
          onProgress: renderProgress,
        });

        console.log('Export completed!');
        console.log(`  Conversations: ${result.conversations}`);
        console.log(`  Prompt-completion pairs: ${result.pairs}`);
        console.log(`  Skipped (empty): ${result.skipped}`);
        if (result.markdownErrors.length > 0) {
          console.log(`  Markdown failures: ${result.markdownErrors.length}`);
        }
        console.log(`  Output: ${result.outDir}`);
      } catch (err) {
        reportFailure('Failed to clean export', err);
      }
    });

  // Inspect command
  program
    .command('inspect')
    .description('List conversations in an export without writing anything')
    .requiredOption('--in <path>', 'Path to conversations.json or the export ZIP')
    .option('--limit <n>', 'Maximum number of conversations to list')
    .option('--json', 'Output as JSON')
    .action(async (options: InspectOptions) => {
      try {
        const limit = parsePositiveInt(options.limit, '--limit');
        const parsed = await loadExport(options.in);
        const rows = parsed.conversations.slice(0, limit).map(conv => ({
          title: conv.title,
          messages: conv.messages.length,
          ...getConversationStats(conv),
        }));

        if (options.json) {
          console.log(JSON.stringify({ conversations: rows, skipped: parsed.skipped }, null, 2));
          return;
        }

        console.log(`Conversations: ${parsed.conversations.length} (skipped ${parsed.skipped})`);
        for (const row of rows) {
          console.log(`  ${row.title}: ${row.messages} messages, ${row.pairCount} pairs`);
        }
      } catch (err) {
        reportFailure('Failed to inspect export', err);
      }
    });
}
