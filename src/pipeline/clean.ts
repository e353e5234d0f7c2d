/**
 * Cleaning pipeline
 * Export file → parsed conversations → markdown, consolidated JSON, JSONL pairs
 */

import { mkdir } from 'fs/promises';
import { join, resolve } from 'path';
import type { Logger } from 'pino';
import { CleanerError, InputFileError, OutputWriteError, errorMessage } from '../errors.js';
import { parseChatGPTExportFile, type ParseResult } from '../ingest/chatgpt/parser.js';
import { extractAndFindConversations, isZipFile } from '../ingest/chatgpt/zip.js';
import type { MessageRole, TrainingPair } from '../ingest/chatgpt/types.js';
import { messagesToPairs } from '../normalize/pairs.js';
import {
  toConversationRecord,
  writeConversationsJson,
  writePairsJsonl,
  type ConversationRecord,
} from '../normalize/chatgpt.js';
import { DEFAULT_MAX_FILENAME_LENGTH, writeMarkdownFiles } from '../export/markdown.js';
import { createLogger } from '../utils/logger.js';

export const CONVERSATIONS_JSON = 'all_conversations.json';
export const PAIRS_JSONL = 'pairs.jsonl';
export const DEFAULT_MARKDOWN_DIR = 'markdown_by_conversation';

/**
 * Cleaning options
 */
export interface CleanOptions {
  input: string;
  outDir: string;
  markdownDirName?: string;
  maxFilenameLength?: number;
  roleLabels?: Partial<Record<MessageRole, string>>;
  skipMarkdown?: boolean;
  dryRun?: boolean;
  logger?: Logger;
  onProgress?: (progress: CleanProgress) => void;
}

/**
 * Cleaning progress
 */
export interface CleanProgress {
  phase: 'reading' | 'parsing' | 'writing' | 'complete';
  current: number;
  total: number;
  title?: string;
}

/**
 * Cleaning result
 */
export interface CleanResult {
  conversations: number;
  messages: number;
  pairs: number;
  skipped: number;
  markdownWritten: number;
  markdownErrors: Array<{ title: string; error: string }>;
  outDir: string;
  dryRun: boolean;
  duration: number;
}

/**
 * Read and parse the input export, unpacking it first if it is a ZIP
 */
export async function loadExport(input: string): Promise<ParseResult> {
  if (!isZipFile(input)) {
    return parseChatGPTExportFile(input);
  }

  let extracted: Awaited<ReturnType<typeof extractAndFindConversations>>;
  try {
    extracted = await extractAndFindConversations(input);
  } catch (err) {
    if (err instanceof CleanerError) throw err;
    throw new InputFileError(`Failed to read ZIP file: ${input} (${errorMessage(err)})`, input, {
      cause: err,
    });
  }

  try {
    return await parseChatGPTExportFile(extracted.conversationsPath);
  } finally {
    await extracted.cleanup();
  }
}

/**
 * Write an aggregate artifact; any failure aborts the run
 */
async function writeAggregate<T>(outputPath: string, write: () => Promise<T>): Promise<T> {
  try {
    return await write();
  } catch (err) {
    throw new OutputWriteError(
      `Failed to write output file ${outputPath}: ${errorMessage(err)}`,
      outputPath,
      { cause: err }
    );
  }
}

/**
 * Run the full cleaning pipeline.
 * @throws InputFileError, ExportFormatError or OutputWriteError
 */
export async function runCleaner(options: CleanOptions): Promise<CleanResult> {
  const startTime = Date.now();
  const logContext = { component: 'cleaner' };
  const log = options.logger ? options.logger.child(logContext) : createLogger(logContext);
  const outDir = resolve(options.outDir);
  const markdownDir = join(outDir, options.markdownDirName ?? DEFAULT_MARKDOWN_DIR);
  const dryRun = options.dryRun ?? false;
  const onProgress = options.onProgress;

  onProgress?.({ phase: 'reading', current: 0, total: 0 });
  log.debug({ input: options.input }, 'Reading export');
  const parsed = await loadExport(options.input);

  if (!dryRun) {
    await writeAggregate(outDir, () => mkdir(outDir, { recursive: true }));
  }

  const records: ConversationRecord[] = [];
  const pairs: TrainingPair[] = [];
  const total = parsed.conversations.length;

  parsed.conversations.forEach((conv, index) => {
    onProgress?.({ phase: 'parsing', current: index + 1, total, title: conv.title });
    records.push(toConversationRecord(conv));
    pairs.push(...messagesToPairs(conv.messages, conv.title));
  });

  let markdownWritten = 0;
  let markdownErrors: CleanResult['markdownErrors'] = [];

  if (!dryRun) {
    if (!options.skipMarkdown) {
      onProgress?.({ phase: 'writing', current: 0, total });
      const batch = await writeAggregate(markdownDir, () =>
        writeMarkdownFiles(records, markdownDir, {
          roleLabels: options.roleLabels,
          maxFilenameLength: options.maxFilenameLength ?? DEFAULT_MAX_FILENAME_LENGTH,
        })
      );
      markdownWritten = batch.written.length;
      markdownErrors = batch.errors;
      for (const failure of batch.errors) {
        log.warn({ title: failure.title, error: failure.error }, 'Failed to write markdown');
      }
    }

    const conversationsPath = join(outDir, CONVERSATIONS_JSON);
    const pairsPath = join(outDir, PAIRS_JSONL);
    await writeAggregate(conversationsPath, () => writeConversationsJson(records, conversationsPath));
    await writeAggregate(pairsPath, () => writePairsJsonl(pairs, pairsPath));
  }

  const result: CleanResult = {
    conversations: records.length,
    messages: parsed.totalMessages,
    pairs: pairs.length,
    skipped: parsed.skipped,
    markdownWritten,
    markdownErrors,
    outDir,
    dryRun,
    duration: Date.now() - startTime,
  };

  onProgress?.({ phase: 'complete', current: total, total });
  log.info(
    {
      conversations: result.conversations,
      pairs: result.pairs,
      skipped: result.skipped,
      markdownErrors: markdownErrors.length,
      outDir,
      dryRun,
    },
    'Export completed'
  );

  return result;
}
