/**
 * Prompt/completion pair builder
 * Regroups a linear message sequence into fine-tuning examples
 */

import type { ConversationMessage, TrainingPair } from '../ingest/chatgpt/types.js';

/** Separator between merged consecutive user turns */
export const PROMPT_SEPARATOR = '\n\n';

/**
 * Convert messages into prompt/completion pairs.
 *
 * Consecutive user turns merge into one prompt, paired with the next
 * assistant turn. Every assistant turn clears the pending user text, so an
 * assistant turn without a preceding user turn is dropped. User turns left
 * pending at the end are discarded.
 */
export function messagesToPairs(
  messages: readonly ConversationMessage[],
  title: string
): TrainingPair[] {
  const pairs: TrainingPair[] = [];
  let pending: string[] = [];

  for (const message of messages) {
    if (message.role === 'user') {
      if (message.text) pending.push(message.text);
      continue;
    }

    if (pending.length > 0 && message.text) {
      const prompt = pending.join(PROMPT_SEPARATOR);
      const completion = message.text;
      if (prompt && completion) {
        pairs.push({ prompt, completion, title });
      }
    }
    pending = [];
  }

  return pairs;
}
