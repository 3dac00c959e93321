import { describe, expect, it } from 'vitest';
import { mergeTrees } from '../src/lib/merge.js';
import { fromPlain, keysOf, toPlain, type MappingNode, type PlainValue } from '../src/lib/tree.js';

function mapping(value: PlainValue): MappingNode {
  const node = fromPlain(value);
  if (node.kind !== 'mapping') throw new Error('expected a mapping');
  return node;
}

describe('mergeTrees', () => {
  const base = mapping({
    version: 1,
    schedules: [{ name: 'a' }],
    plugins: { extractors: [{ name: 'e1' }], loaders: [{ name: 'l1' }] },
    database_uri: 'sqlite:///one.db',
  });
  const incoming = mapping({
    schedules: [{ name: 'b' }],
    plugins: { extractors: [{ name: 'e2' }], mappers: [{ name: 'm1' }] },
    database_uri: 'sqlite:///two.db',
    jobs: [{ name: 'j1', tasks: ['e1 l1'] }],
  });

  it('concatenates sequences, merges plugins per kind and replaces the rest', () => {
    const merged = mergeTrees(base, incoming);
    expect(keysOf(merged)).toEqual(['version', 'schedules', 'plugins', 'database_uri', 'jobs']);
    expect(toPlain(merged)).toEqual({
      version: 1,
      schedules: [{ name: 'a' }, { name: 'b' }],
      plugins: {
        extractors: [{ name: 'e1' }, { name: 'e2' }],
        loaders: [{ name: 'l1' }],
        mappers: [{ name: 'm1' }],
      },
      database_uri: 'sqlite:///two.db',
      jobs: [{ name: 'j1', tasks: ['e1 l1'] }],
    });
  });

  it('leaves both inputs untouched', () => {
    const before = [toPlain(base), toPlain(incoming)];
    mergeTrees(base, incoming);
    expect([toPlain(base), toPlain(incoming)]).toEqual(before);
  });

  it('does not deep-merge other mappings', () => {
    const merged = mergeTrees(mapping({ extra: { a: 1, b: 2 } }), mapping({ extra: { c: 3 } }));
    expect(toPlain(merged)).toEqual({ extra: { c: 3 } });
  });

  it('replaces a value whose type differs', () => {
    expect(toPlain(mergeTrees(mapping({ schedules: [{ name: 'a' }] }), mapping({ schedules: 'none' })))).toEqual({
      schedules: 'none',
    });
    expect(
      toPlain(mergeTrees(mapping({ plugins: { extractors: [{ name: 'e1' }] } }), mapping({ plugins: { extractors: null } }))),
    ).toEqual({ plugins: { extractors: null } });
  });
});
