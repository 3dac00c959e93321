export type ScalarValue = string | number | boolean | null;

export type PlainValue = ScalarValue | PlainValue[] | { [key: string]: PlainValue };

/** Where a node was read from. Absent on nodes built in memory. */
export type NodeOrigin = {
  source?: string;
  line?: number;
  column?: number;
};

export type ScalarNode = NodeOrigin & { kind: 'scalar'; value: ScalarValue };
export type SequenceNode = NodeOrigin & { kind: 'sequence'; items: readonly TreeNode[] };
export type MappingEntry = readonly [key: string, value: TreeNode];
export type MappingNode = NodeOrigin & { kind: 'mapping'; entries: readonly MappingEntry[] };

export type TreeNode = ScalarNode | SequenceNode | MappingNode;

export type PathSegment = string | number;

export function scalarNode(value: ScalarValue, origin: NodeOrigin = {}): ScalarNode {
  return { ...origin, kind: 'scalar', value };
}

export function sequenceNode(items: readonly TreeNode[], origin: NodeOrigin = {}): SequenceNode {
  return { ...origin, kind: 'sequence', items };
}

export function mappingNode(entries: readonly MappingEntry[], origin: NodeOrigin = {}): MappingNode {
  return { ...origin, kind: 'mapping', entries };
}

export function getEntry(node: TreeNode | undefined, key: string): TreeNode | undefined {
  if (!node || node.kind !== 'mapping') return undefined;
  const entry = node.entries.find(([k]) => k === key);
  return entry?.[1];
}

export function getString(node: TreeNode | undefined, key: string): string | undefined {
  const value = getEntry(node, key);
  return value?.kind === 'scalar' && typeof value.value === 'string' ? value.value : undefined;
}

export function getSequence(node: TreeNode | undefined, key: string): readonly TreeNode[] {
  const value = getEntry(node, key);
  return value?.kind === 'sequence' ? value.items : [];
}

export function keysOf(node: MappingNode): string[] {
  return node.entries.map(([key]) => key);
}

export function describeKind(node: TreeNode): string {
  if (node.kind !== 'scalar') return node.kind;
  return node.value === null ? 'null' : typeof node.value;
}

export function nodeAt(root: TreeNode, path: readonly PathSegment[]): TreeNode | undefined {
  let current: TreeNode | undefined = root;
  for (const segment of path) {
    if (!current) return undefined;
    if (typeof segment === 'number') {
      current = current.kind === 'sequence' ? current.items[segment] : undefined;
    } else {
      current = getEntry(current, segment);
    }
  }
  return current;
}

/** Renders `['schedules', 0, 'interval']` as `schedules[0].interval`. */
export function formatPath(path: readonly PathSegment[]): string {
  if (path.length === 0) return '<root>';
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') out += `[${segment}]`;
    else out += out.length === 0 ? segment : `.${segment}`;
  }
  return out;
}

/** Adds an own enumerable property, so that keys such as `__proto__` stay plain data. */
export function setOwn<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export function toPlain(node: TreeNode): PlainValue {
  switch (node.kind) {
    case 'scalar':
      return node.value;
    case 'sequence':
      return node.items.map(toPlain);
    case 'mapping': {
      const out: { [key: string]: PlainValue } = {};
      for (const [key, value] of node.entries) setOwn(out, key, toPlain(value));
      return out;
    }
  }
}

export function fromPlain(value: PlainValue, origin: NodeOrigin = {}): TreeNode {
  if (Array.isArray(value)) return sequenceNode(value.map((item) => fromPlain(item, origin)), origin);
  if (value !== null && typeof value === 'object') {
    return mappingNode(
      Object.entries(value).map(([key, item]) => [key, fromPlain(item, origin)] as const),
      origin,
    );
  }
  return scalarNode(value, origin);
}
