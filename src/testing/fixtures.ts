/**
 * Test fixtures: export records and in-memory ZIP archives
 */

import AdmZip from 'adm-zip';

export interface NodeInit {
  id: string;
  parent?: string | null;
  /** Omit for a node without a message (e.g. the root) */
  role?: string;
  parts?: unknown[];
  contentType?: string;
  metadata?: Record<string, unknown>;
}

export function exportNode(init: NodeInit): Record<string, unknown> {
  return {
    id: init.id,
    parent: init.parent ?? null,
    children: [],
    message:
      init.role === undefined
        ? null
        : {
            id: init.id,
            author: { role: init.role },
            content: { content_type: init.contentType ?? 'text', parts: init.parts ?? [] },
            metadata: init.metadata ?? {},
          },
  };
}

/**
 * Build a conversation record; current_node defaults to the last node
 */
export function exportConversation(
  title: string | undefined,
  nodes: NodeInit[],
  currentNode?: string
): Record<string, unknown> {
  return {
    title,
    create_time: 1706745600,
    update_time: 1706749200,
    mapping: Object.fromEntries(nodes.map(node => [node.id, exportNode(node)])),
    current_node: currentNode ?? nodes.at(-1)?.id,
  };
}

/**
 * Build a linear conversation: an empty root followed by one node per turn
 */
export function chatConversation(
  title: string,
  turns: Array<[role: string, text: string]>
): Record<string, unknown> {
  const nodes: NodeInit[] = [{ id: 'root', parent: null }];
  turns.forEach(([role, text], i) => {
    nodes.push({
      id: `msg-${i + 1}`,
      parent: i === 0 ? 'root' : `msg-${i}`,
      role,
      parts: [text],
    });
  });
  return exportConversation(title, nodes);
}

/**
 * Build a ZIP archive in memory; entry names are written as given
 */
export function buildZip(entries: Array<{ name: string; content: string }>): Buffer {
  const zip = new AdmZip();
  for (const entry of entries) {
    zip.addFile(entry.name, Buffer.from(entry.content, 'utf-8'));
  }
  return zip.toBuffer();
}
