/**
 * Markdown export module
 * Generates one markdown transcript per conversation
 */

import { writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { errorMessage } from '../errors.js';
import type { ConversationMessage, MessageRole } from '../ingest/chatgpt/types.js';
import type { ConversationRecord } from '../normalize/chatgpt.js';

/** Default maximum filename length, before the extension */
export const DEFAULT_MAX_FILENAME_LENGTH = 120;

/** Filename used when a title sanitizes to nothing */
export const FALLBACK_FILENAME = 'conversation';

/**
 * Options for markdown generation
 */
export interface MarkdownOptions {
  roleLabels?: Partial<Record<MessageRole, string>>;
  maxFilenameLength?: number;
}

export const DEFAULT_ROLE_LABELS: Record<MessageRole, string> = {
  user: '👤 You',
  assistant: '🤖 Assistant',
};

/**
 * Turn a conversation title into a single safe path segment.
 * Each run of characters other than letters, digits, underscore, hyphen,
 * period and space becomes one underscore. Truncation counts code points.
 */
export function sanitizeFilename(
  title: string,
  maxLength: number = DEFAULT_MAX_FILENAME_LENGTH
): string {
  const replaced = title.replace(/[^\p{L}\p{N}_\-. ]+/gu, '_');
  const safe = Array.from(replaced).slice(0, maxLength).join('').trim();
  return safe || FALLBACK_FILENAME;
}

/**
 * Generate filename from conversation title
 */
export function generateFilename(
  title: string,
  maxLength: number = DEFAULT_MAX_FILENAME_LENGTH
): string {
  return `${sanitizeFilename(title, maxLength)}.md`;
}

/**
 * Format a single message block
 */
export function formatMessage(
  msg: ConversationMessage,
  roleLabels: Record<MessageRole, string> = DEFAULT_ROLE_LABELS
): string {
  return `**${roleLabels[msg.role]}**:\n\n${msg.text}\n`;
}

/**
 * Generate markdown content for a conversation
 */
export function toMarkdown(conv: ConversationRecord, options: MarkdownOptions = {}): string {
  const roleLabels = { ...DEFAULT_ROLE_LABELS, ...options.roleLabels };
  const sections = [`# ${conv.title}\n`];

  for (const msg of conv.messages) {
    sections.push(formatMessage(msg, roleLabels));
  }

  return sections.join('\n');
}

/**
 * Write result information
 */
export interface WriteMarkdownResult {
  filePath: string;
  filename: string;
  bytesWritten: number;
}

/**
 * Write a conversation to a markdown file.
 * Conversations whose titles sanitize to the same name overwrite each other.
 */
export async function writeMarkdownFile(
  conv: ConversationRecord,
  outputDir: string,
  options: MarkdownOptions = {}
): Promise<WriteMarkdownResult> {
  const filename = generateFilename(conv.title, options.maxFilenameLength);
  const filePath = join(outputDir, filename);
  const content = toMarkdown(conv, options);

  await writeFile(filePath, content, 'utf-8');

  return {
    filePath,
    filename,
    bytesWritten: Buffer.byteLength(content, 'utf-8'),
  };
}

/**
 * Batch write result
 */
export interface BatchWriteResult {
  written: WriteMarkdownResult[];
  errors: Array<{ title: string; error: string }>;
  totalBytesWritten: number;
}

/**
 * Write multiple conversations to markdown files.
 * A failed file is recorded in `errors` and the rest are still written.
 */
export async function writeMarkdownFiles(
  conversations: readonly ConversationRecord[],
  outputDir: string,
  options: MarkdownOptions = {}
): Promise<BatchWriteResult> {
  const written: WriteMarkdownResult[] = [];
  const errors: Array<{ title: string; error: string }> = [];
  let totalBytesWritten = 0;

  await mkdir(outputDir, { recursive: true });

  for (const conv of conversations) {
    try {
      const result = await writeMarkdownFile(conv, outputDir, options);
      written.push(result);
      totalBytesWritten += result.bytesWritten;
    } catch (err) {
      errors.push({
        title: conv.title,
        error: errorMessage(err),
      });
    }
  }

  return {
    written,
    errors,
    totalBytesWritten,
  };
}
