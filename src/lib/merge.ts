import { mappingNode, sequenceNode, type MappingEntry, type MappingNode, type TreeNode } from './tree.js';

/** Top-level key whose mapping is merged kind by kind instead of replaced. */
export const PLUGINS_KEY = 'plugins';

function concatSequences(base: TreeNode, incoming: TreeNode): TreeNode | undefined {
  if (base.kind !== 'sequence' || incoming.kind !== 'sequence') return undefined;
  return sequenceNode([...base.items, ...incoming.items], base);
}

function mergeEntries(
  base: MappingNode,
  incoming: MappingNode,
  combine: (key: string, current: TreeNode, next: TreeNode) => TreeNode,
): MappingNode {
  const entries: MappingEntry[] = base.entries.slice();
  for (const [key, value] of incoming.entries) {
    const idx = entries.findIndex(([existing]) => existing === key);
    if (idx === -1) {
      entries.push([key, value]);
      continue;
    }
    entries[idx] = [key, combine(key, entries[idx][1], value)];
  }
  return mappingNode(entries, base);
}

function mergePluginKinds(base: MappingNode, incoming: MappingNode): MappingNode {
  return mergeEntries(base, incoming, (_kind, current, next) => concatSequences(current, next) ?? next);
}

/**
 * Merges an included document into the tree built so far.
 *
 * Top-level sequences concatenate (base items first). `plugins` is merged per
 * kind with the same rule. Every other key is replaced wholesale by the
 * incoming value; there is no deep merge. Neither input is modified, and new
 * keys land after the existing ones in incoming order.
 */
export function mergeTrees(base: MappingNode, incoming: MappingNode): MappingNode {
  return mergeEntries(base, incoming, (key, current, next) => {
    const concatenated = concatSequences(current, next);
    if (concatenated) return concatenated;
    if (key === PLUGINS_KEY && current.kind === 'mapping' && next.kind === 'mapping') {
      return mergePluginKinds(current, next);
    }
    return next;
  });
}
