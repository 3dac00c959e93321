import {
  Document,
  LineCounter,
  Pair,
  Scalar,
  YAMLMap,
  YAMLSeq,
  isAlias,
  isMap,
  isScalar,
  isSeq,
  parseDocument as parseYamlDocument,
} from 'yaml';
import { ParseError } from '../types.js';
import {
  describeKind,
  mappingNode,
  scalarNode,
  sequenceNode,
  type MappingEntry,
  type MappingNode,
  type NodeOrigin,
  type ScalarValue,
  type TreeNode,
} from './tree.js';

/** Alias expansions allowed per document, matching the `yaml` package's own `maxAliasCount`. */
export const MAX_ALIAS_COUNT = 100;

type ConvertContext = {
  doc: Document.Parsed;
  lineCounter: LineCounter;
  source?: string;
  /** Anchored nodes currently being expanded through an alias. */
  resolving: Set<unknown>;
  aliasCount: number;
};

function originOf(node: unknown, ctx: ConvertContext): NodeOrigin {
  const origin: NodeOrigin = ctx.source ? { source: ctx.source } : {};
  if ((isScalar(node) || isMap(node) || isSeq(node) || isAlias(node)) && node.range) {
    const pos = ctx.lineCounter.linePos(node.range[0]);
    origin.line = pos.line;
    origin.column = pos.col;
  }
  return origin;
}

function toScalarValue(value: unknown): ScalarValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return String(value);
}

function errorAt(reason: string, origin: NodeOrigin, ctx: ConvertContext): ParseError {
  return new ParseError(reason, { source: ctx.source, line: origin.line ?? 1, column: origin.column ?? 1 });
}

function convertKey(key: unknown, ctx: ConvertContext): string {
  if (key === null) return '';
  if (isScalar(key)) {
    const value = toScalarValue(key.value);
    return value === null ? '' : String(value);
  }
  throw errorAt('mapping keys must be scalars', originOf(key, ctx), ctx);
}

function convert(node: unknown, ctx: ConvertContext, fallback: NodeOrigin): TreeNode {
  if (node === null || node === undefined) return scalarNode(null, fallback);

  if (isAlias(node)) {
    const at = originOf(node, ctx);
    const target = node.resolve(ctx.doc);
    if (target === undefined) throw errorAt(`unknown alias *${node.source}`, at, ctx);
    if (ctx.resolving.has(target)) throw errorAt(`alias *${node.source} refers to itself`, at, ctx);
    ctx.aliasCount += 1;
    if (ctx.aliasCount > MAX_ALIAS_COUNT) {
      throw errorAt(`more than ${MAX_ALIAS_COUNT} alias expansions in one document`, at, ctx);
    }
    ctx.resolving.add(target);
    try {
      return convert(target, ctx, at);
    } finally {
      ctx.resolving.delete(target);
    }
  }

  const origin = originOf(node, ctx);

  if (isScalar(node)) return scalarNode(toScalarValue(node.value), origin);

  if (isSeq(node)) {
    return sequenceNode(
      node.items.map((item) => convert(item, ctx, origin)),
      origin,
    );
  }

  if (isMap(node)) {
    const seen = new Set<string>();
    const entries: MappingEntry[] = node.items.map((pair) => {
      const key = convertKey(pair.key, ctx);
      const keyOrigin = originOf(pair.key, ctx);
      // `1` and `"1"` are distinct YAML keys but the same key here
      if (seen.has(key)) throw errorAt(`duplicate key '${key}'`, keyOrigin, ctx);
      seen.add(key);
      return [key, convert(pair.value, ctx, keyOrigin)];
    });
    return mappingNode(entries, origin);
  }

  throw errorAt('unsupported YAML node', origin, ctx);
}

/**
 * Parses one YAML document into a tagged tree.
 *
 * Scalars follow the YAML 1.2 core schema, so timestamps stay strings and
 * only `true`/`false` are booleans. Comments are dropped. The first syntax
 * error (bad indentation, unterminated scalars, duplicate keys, more than one
 * document) is raised as a ParseError carrying its 1-based line and column.
 */
export function parseDocument(text: string, source?: string): TreeNode {
  const lineCounter = new LineCounter();
  const doc = parseYamlDocument(text, {
    lineCounter,
    prettyErrors: false,
    uniqueKeys: true,
    schema: 'core',
  });

  const [first] = doc.errors;
  if (first) {
    const pos = lineCounter.linePos(first.pos[0]);
    throw new ParseError(first.message, { source, line: pos.line, column: pos.col });
  }

  const ctx: ConvertContext = { doc, lineCounter, source, resolving: new Set(), aliasCount: 0 };
  return convert(doc.contents, ctx, source ? { source, line: 1, column: 1 } : {});
}

export function assertMappingRoot(node: TreeNode, source?: string): MappingNode {
  if (node.kind === 'mapping') return node;
  throw new ParseError(`top-level value must be a mapping, found ${describeKind(node)}`, {
    source: node.source ?? source,
    line: node.line ?? 1,
    column: node.column ?? 1,
  });
}

function toYamlNode(node: TreeNode): Scalar | YAMLSeq | YAMLMap {
  switch (node.kind) {
    case 'scalar':
      return new Scalar(node.value);
    case 'sequence': {
      const seq = new YAMLSeq();
      for (const item of node.items) seq.items.push(toYamlNode(item));
      return seq;
    }
    case 'mapping': {
      const map = new YAMLMap();
      for (const [key, value] of node.entries) map.items.push(new Pair(new Scalar(key), toYamlNode(value)));
      return map;
    }
  }
}

/** Writes a tree back to YAML, keeping key and sequence order. */
export function serializeTree(node: TreeNode): string {
  return new Document(toYamlNode(node)).toString();
}
