import { describe, expect, it } from 'vitest';

import {
  childPath,
  describeNode,
  freezeDocument,
  isMapping,
  isScalar,
  isSequence,
  type ConfigDocument,
} from '../src/core/node.js';

describe('config nodes', () => {
  it('classifies mappings, sequences and scalars', () => {
    expect(isMapping({ a: 1 })).toBe(true);
    expect(isMapping(Object.create(null))).toBe(true);
    expect(isMapping([])).toBe(false);
    expect(isMapping(null)).toBe(false);
    expect(isMapping(new Date(0))).toBe(false);

    expect(isSequence([1, 'a'])).toBe(true);
    expect(isSequence({ 0: 'a' })).toBe(false);

    expect(isScalar('a')).toBe(true);
    expect(isScalar(3)).toBe(true);
    expect(isScalar(false)).toBe(true);
    expect(isScalar(null)).toBe(true);
    expect(isScalar(undefined)).toBe(false);
    expect(isScalar({})).toBe(false);
  });

  it('freezes a document deeply and returns the same reference', () => {
    const doc: ConfigDocument = { a: { b: [1, { c: 2 }] } };
    const frozen = freezeDocument(doc);

    expect(frozen).toBe(doc);
    expect(Object.isFrozen(doc)).toBe(true);
    expect(Object.isFrozen(doc.a)).toBe(true);
    const a = doc.a;
    expect(isMapping(a) && Object.isFrozen(a.b)).toBe(true);
  });

  it('joins build paths', () => {
    expect(childPath('config', 'a')).toBe('config.a');
    expect(childPath('config.list', 2)).toBe('config.list.2');
    expect(childPath('', 'root')).toBe('root');
  });

  it('describes nodes briefly', () => {
    expect(describeNode('coucou')).toBe('"coucou"');
    expect(describeNode(5)).toBe('5');
    expect(describeNode({ a: [1, 2] })).toBe('{"a":[1,2]}');
    expect(describeNode('x'.repeat(100), 10)).toBe(`"${'x'.repeat(8)}…`);
  });
});
