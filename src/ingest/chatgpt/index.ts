/**
 * ChatGPT ingestion module
 * Parses ChatGPT JSON exports into ordered user/assistant messages
 */

export {
  DEFAULT_TITLE,
  flattenParts,
  extractMessages,
  extractConversationMessages,
  readConversationRecords,
  parseConversation,
  parseConversationRecords,
  decodeExport,
  parseChatGPTExport,
  readExportFile,
  parseChatGPTExportFile,
  getConversationStats,
  type ParsedConversation,
  type ParseResult,
} from './parser.js';

export { walkCurrentPath } from './traverse.js';

export {
  ConversationSchema,
  ExportDocumentSchema,
  ExportMessageSchema,
  MappingNodeSchema,
  ContentPartSchema,
  type Conversation,
  type ConversationMessage,
  type ContentPart,
  type ExportDocument,
  type ExportMessage,
  type Mapping,
  type MappingNode,
  type MessageRole,
  type StructuredPart,
  type TrainingPair,
} from './types.js';

export {
  CONVERSATIONS_FILENAME,
  createTempDir,
  cleanupTempDir,
  extractZip,
  findConversationsJson,
  isZipFile,
  extractAndFindConversations,
  type ExtractionResult,
} from './zip.js';
