/**
 * ChatGPT JSON export parser
 * Parses conversations.json files from ChatGPT data exports
 */

import { readFile } from 'fs/promises';
import { ExportFormatError, InputFileError, errorMessage } from '../../errors.js';
import { cleanText, trimWhitespace } from '../../normalize/text.js';
import { messagesToPairs } from '../../normalize/pairs.js';
import { walkCurrentPath } from './traverse.js';
import {
  ContentPartSchema,
  ConversationSchema,
  ExportDocumentSchema,
  type ContentPart,
  type Conversation,
  type ConversationMessage,
  type MappingNode,
} from './types.js';

const TEXT_CONTENT_TYPES = new Set(['text', 'multimodal_text']);
const ASSISTANT_ALIASES = new Set(['assistant', 'tool', 'ChatGPT']);

/** Title used when a conversation has none */
export const DEFAULT_TITLE = 'Conversation';

/**
 * Parsed conversation with messages on the current path
 */
export interface ParsedConversation {
  id: string | null;
  title: string;
  messages: ConversationMessage[];
}

/**
 * Parse result with statistics
 */
export interface ParseResult {
  conversations: ParsedConversation[];
  totalMessages: number;
  /** Records that were not objects or produced no messages */
  skipped: number;
}

/**
 * Read one content part; other shapes (numbers, nulls, arrays) give null
 */
function toContentPart(raw: unknown): ContentPart | null {
  const result = ContentPartSchema.safeParse(raw);
  return result.success ? result.data : null;
}

/**
 * Flatten content parts into one text blob
 */
export function flattenParts(parts: readonly unknown[] | null | undefined): string {
  const chunks: string[] = [];

  for (const raw of parts ?? []) {
    const part = toContentPart(raw);
    if (part === null) continue;

    if (typeof part === 'string') {
      if (trimWhitespace(part)) chunks.push(part);
    } else if (part.text) {
      // Generic text parts and audio_transcription parts both carry `text`
      chunks.push(part.text);
    }
  }

  return chunks.join('\n');
}

/**
 * Metadata flags count as set unless falsy or an empty array/object
 */
function isFlagSet(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (value !== null && typeof value === 'object') return Object.keys(value).length > 0;
  return Boolean(value);
}

/**
 * Resolve the author role, mapping tool and "ChatGPT" authors to assistant
 */
function resolveAuthor(role: string | null | undefined): string {
  const author = role ?? '';
  return ASSISTANT_ALIASES.has(author) ? 'assistant' : author;
}

/**
 * Convert one traversed node to a message, or null when it is filtered out
 */
function extractMessage(node: MappingNode): ConversationMessage | null {
  const message = node.message;
  if (!message) return null;

  const author = resolveAuthor(message.author?.role);
  if (author === 'system' && !isFlagSet(message.metadata?.is_user_system_message)) {
    return null;
  }

  const contentType = message.content?.content_type;
  if (!contentType || !TEXT_CONTENT_TYPES.has(contentType)) return null;

  const text = cleanText(flattenParts(message.content?.parts));
  if (!text) return null;

  return {
    role: author === 'assistant' ? 'assistant' : 'user',
    text,
  };
}

/**
 * Filter traversed nodes to user/assistant turns with normalized text
 */
export function extractMessages(nodes: readonly MappingNode[]): ConversationMessage[] {
  const messages: ConversationMessage[] = [];
  for (const node of nodes) {
    const message = extractMessage(node);
    if (message) messages.push(message);
  }
  return messages;
}

/**
 * Extract the ordered messages of a conversation's current path
 */
export function extractConversationMessages(conv: Conversation): ConversationMessage[] {
  return extractMessages(walkCurrentPath(conv.mapping, conv.current_node));
}

/**
 * Pull the conversation records out of a decoded export document
 * @throws ExportFormatError when the document is neither shape
 */
export function readConversationRecords(data: unknown): unknown[] {
  const result = ExportDocumentSchema.safeParse(data);
  if (!result.success) {
    throw new ExportFormatError(
      "Invalid format: expected {'conversations': [...]} or [...]"
    );
  }
  return Array.isArray(result.data) ? result.data : result.data.conversations;
}

/**
 * Parse a single conversation record, or null if it is not an object
 */
export function parseConversation(raw: unknown): ParsedConversation | null {
  const result = ConversationSchema.safeParse(raw);
  if (!result.success) return null;

  const conv = result.data;
  return {
    id: conv.conversation_id || conv.id || null,
    title: conv.title || DEFAULT_TITLE,
    messages: extractConversationMessages(conv),
  };
}

/**
 * Parse the conversation records of an already decoded export document
 */
export function parseConversationRecords(records: readonly unknown[]): ParseResult {
  const conversations: ParsedConversation[] = [];
  let totalMessages = 0;
  let skipped = 0;

  for (const record of records) {
    const conv = parseConversation(record);
    if (!conv || conv.messages.length === 0) {
      skipped++;
      continue;
    }
    conversations.push(conv);
    totalMessages += conv.messages.length;
  }

  return { conversations, totalMessages, skipped };
}

/**
 * Decode export JSON text into conversation records
 * @throws ExportFormatError on invalid JSON or a wrong top-level shape
 */
export function decodeExport(jsonContent: string): unknown[] {
  let rawData: unknown;
  try {
    rawData = JSON.parse(jsonContent);
  } catch (err) {
    throw new ExportFormatError(`Failed to parse JSON: ${errorMessage(err)}`, { cause: err });
  }
  return readConversationRecords(rawData);
}

/**
 * Parse ChatGPT export JSON string
 */
export function parseChatGPTExport(jsonContent: string): ParseResult {
  return parseConversationRecords(decodeExport(jsonContent));
}

/**
 * Read an export file as UTF-8; undecodable bytes become U+FFFD
 * @throws InputFileError when the file is missing or unreadable
 */
export async function readExportFile(filePath: string): Promise<string> {
  try {
    const buffer = await readFile(filePath);
    return new TextDecoder('utf-8').decode(buffer);
  } catch (err) {
    throw new InputFileError(
      `Input file not readable: ${filePath} (${errorMessage(err)})`,
      filePath,
      { cause: err }
    );
  }
}

/**
 * Parse ChatGPT export from file path
 */
export async function parseChatGPTExportFile(filePath: string): Promise<ParseResult> {
  return parseChatGPTExport(await readExportFile(filePath));
}

/**
 * Get conversation statistics
 */
export function getConversationStats(conv: ParsedConversation) {
  const userMessages = conv.messages.filter(m => m.role === 'user');
  const assistantMessages = conv.messages.filter(m => m.role === 'assistant');

  const totalChars = conv.messages.reduce((sum, m) => sum + m.text.length, 0);
  const avgMessageLength = conv.messages.length > 0
    ? Math.round(totalChars / conv.messages.length)
    : 0;

  return {
    userMessageCount: userMessages.length,
    assistantMessageCount: assistantMessages.length,
    pairCount: messagesToPairs(conv.messages, conv.title).length,
    totalCharacters: totalChars,
    averageMessageLength: avgMessageLength,
  };
}
