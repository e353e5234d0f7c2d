/**
 * ChatGPT export type definitions
 * Based on the conversations.json format from ChatGPT data exports.
 *
 * Every field is optional and falls back via `.catch()`, so a wrong-typed
 * field reads as absent instead of rejecting the whole record.
 */

import { z } from 'zod';

const optionalString = z.string().nullish().catch(undefined);
const optionalNumber = z.number().nullish().catch(undefined);

/**
 * Structured content part (text, audio transcription, image pointer, ...)
 */
export const StructuredPartSchema = z
  .object({
    content_type: optionalString,
    text: optionalString,
  })
  .passthrough();
export type StructuredPart = z.infer<typeof StructuredPartSchema>;

/**
 * Content part - a plain string or a structured object
 */
export const ContentPartSchema = z.union([z.string(), StructuredPartSchema]);
export type ContentPart = z.infer<typeof ContentPartSchema>;

/**
 * Message content
 */
export const MessageContentSchema = z
  .object({
    content_type: optionalString,
    parts: z.array(z.unknown()).nullish().catch(undefined),
  })
  .passthrough();
export type MessageContent = z.infer<typeof MessageContentSchema>;

/**
 * Author information
 */
export const AuthorSchema = z
  .object({
    role: optionalString,
    name: optionalString,
  })
  .passthrough();
export type Author = z.infer<typeof AuthorSchema>;

export const MessageMetadataSchema = z
  .object({
    is_user_system_message: z.unknown().optional(),
  })
  .passthrough();
export type MessageMetadata = z.infer<typeof MessageMetadataSchema>;

/**
 * A single message payload carried by a mapping node
 */
export const ExportMessageSchema = z
  .object({
    id: optionalString,
    author: AuthorSchema.nullish().catch(undefined),
    content: MessageContentSchema.nullish().catch(undefined),
    metadata: MessageMetadataSchema.nullish().catch(undefined),
    create_time: optionalNumber,
  })
  .passthrough();
export type ExportMessage = z.infer<typeof ExportMessageSchema>;

/**
 * Mapping entry - a node in the parent-linked message tree
 */
export const MappingNodeSchema = z
  .object({
    id: optionalString,
    parent: optionalString,
    children: z.array(z.string()).optional().catch(undefined),
    message: ExportMessageSchema.nullish().catch(undefined),
  })
  .passthrough();
export type MappingNode = z.infer<typeof MappingNodeSchema>;

/**
 * Conversation mapping - node ID to node
 */
export const MappingSchema = z.record(z.string(), MappingNodeSchema.catch({}));
export type Mapping = z.infer<typeof MappingSchema>;

/**
 * A complete ChatGPT conversation record
 */
export const ConversationSchema = z
  .object({
    id: optionalString,
    conversation_id: optionalString,
    title: optionalString,
    create_time: optionalNumber,
    update_time: optionalNumber,
    mapping: MappingSchema.catch({}),
    current_node: optionalString,
  })
  .passthrough();
export type Conversation = z.infer<typeof ConversationSchema>;

/**
 * Top-level export document: `{ conversations: [...] }` or a bare array
 */
export const ExportDocumentSchema = z.union([
  z.array(z.unknown()),
  z.object({ conversations: z.array(z.unknown()) }).passthrough(),
]);
export type ExportDocument = z.infer<typeof ExportDocumentSchema>;

export type MessageRole = 'user' | 'assistant';

/**
 * A user or assistant turn with normalized, non-empty text
 */
export interface ConversationMessage {
  role: MessageRole;
  text: string;
}

/**
 * A prompt/completion fine-tuning example
 */
export interface TrainingPair {
  prompt: string;
  completion: string;
  title: string;
}
