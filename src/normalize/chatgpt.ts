/**
 * ChatGPT artifact serializers
 * Consolidated conversations JSON and prompt/completion JSONL
 */

import { writeFile } from 'fs/promises';
import type { ConversationMessage, TrainingPair } from '../ingest/chatgpt/types.js';
import type { ParsedConversation } from '../ingest/chatgpt/parser.js';

/**
 * One entry of all_conversations.json
 */
export interface ConversationRecord {
  title: string;
  messages: ConversationMessage[];
}

/**
 * One line of pairs.jsonl
 */
export interface PairRecord {
  prompt: string;
  completion: string;
  _title: string;
}

/**
 * Write result information
 */
export interface WriteResult {
  recordCount: number;
  bytesWritten: number;
  outputPath: string;
}

export function toConversationRecord(conv: ParsedConversation): ConversationRecord {
  return {
    title: conv.title,
    messages: conv.messages.map(m => ({ role: m.role, text: m.text })),
  };
}

export function toPairRecord(pair: TrainingPair): PairRecord {
  return {
    prompt: pair.prompt,
    completion: pair.completion,
    _title: pair.title,
  };
}

/**
 * Serialize consolidated records as indented JSON
 */
export function toConversationsJson(records: readonly ConversationRecord[]): string {
  return JSON.stringify(records, null, 2);
}

/**
 * Write the consolidated conversations file
 */
export async function writeConversationsJson(
  records: readonly ConversationRecord[],
  outputPath: string
): Promise<WriteResult> {
  const content = toConversationsJson(records);
  await writeFile(outputPath, content, 'utf-8');

  return {
    recordCount: records.length,
    bytesWritten: Buffer.byteLength(content, 'utf-8'),
    outputPath,
  };
}

/**
 * Convert a pair to a JSONL line (without the newline)
 */
export function toJsonLine(pair: TrainingPair): string {
  return JSON.stringify(toPairRecord(pair));
}

/**
 * Serialize pairs as JSONL, one newline-terminated line per pair
 */
export function toJsonl(pairs: readonly TrainingPair[]): string {
  return pairs.map(pair => toJsonLine(pair) + '\n').join('');
}

/**
 * Write pairs to a JSONL file
 */
export async function writePairsJsonl(
  pairs: readonly TrainingPair[],
  outputPath: string
): Promise<WriteResult> {
  const content = toJsonl(pairs);
  await writeFile(outputPath, content, 'utf-8');

  return {
    recordCount: pairs.length,
    bytesWritten: Buffer.byteLength(content, 'utf-8'),
    outputPath,
  };
}
