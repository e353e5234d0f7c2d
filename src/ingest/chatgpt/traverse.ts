/**
 * Mapping traversal
 * Rebuilds the active conversation path from a parent-linked node mapping
 */

import type { Mapping, MappingNode } from './types.js';

/**
 * Walk from the current leaf back to the root through parent links and
 * return the visited nodes in root-to-leaf order.
 *
 * Only the ancestor chain of `current` is visited; sibling branches (edited
 * or regenerated turns) are ignored. The walk stops at an absent identifier,
 * an identifier missing from the mapping, or one already visited, so a stale
 * parent yields a partial path and a parent cycle still terminates.
 */
export function walkCurrentPath(
  mapping: Mapping | null | undefined,
  current: string | null | undefined
): MappingNode[] {
  if (!mapping) return [];

  const path: MappingNode[] = [];
  const seen = new Set<string>();
  let id = current;

  while (id && Object.hasOwn(mapping, id) && !seen.has(id)) {
    seen.add(id);
    const node = mapping[id];
    path.push(node);
    id = node.parent;
  }

  return path.reverse();
}
