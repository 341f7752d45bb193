import { homedir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { ExperimentConfig } from '../src/core/experiment-config.js';
import { isMapping } from '../src/core/node.js';
import { InvalidDocumentError, UnsupportedFormatError } from '../src/errors/errors.js';
import { SUPPORTED_EXTENSIONS, expandHome, loadDocument, parseDocument } from '../src/loader/load.js';
import { Registry } from '../src/registry/registry.js';

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const EXPECTED = {
  test: 'coucou',
  second: ['$VAR', '$test'],
  optimizer: { _name: 'Adam', lr: 0.01 },
};

describe('loadDocument', () => {
  it.each(['experiment.yaml', 'experiment.json', 'experiment.toml'])('parses %s', (name) => {
    const doc = loadDocument(fixture(name));
    expect(doc).toEqual(EXPECTED);
    expect(Object.isFrozen(doc)).toBe(true);
  });

  it('copies in-memory documents instead of freezing them', () => {
    const source = { a: { b: [1, 2] } };
    const doc = loadDocument(source);

    expect(doc).toEqual(source);
    expect(doc).not.toBe(source);
    expect(Object.isFrozen(doc.a)).toBe(true);
    expect(Object.isFrozen(source.a)).toBe(false);
  });

  it('keeps __proto__ keys and freezes the mappings holding them', () => {
    const doc = loadDocument(JSON.parse('{"cfg":{"__proto__":{"x":1},"y":2}}'));
    const cfg = doc.cfg;

    expect(isMapping(cfg)).toBe(true);
    expect(Object.keys(cfg ?? {})).toEqual(['__proto__', 'y']);
    expect(Object.isFrozen(cfg)).toBe(true);
  });

  it('rejects unsupported extensions', () => {
    try {
      loadDocument(fixture('experiment.ini'));
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(UnsupportedFormatError);
      expect((e as UnsupportedFormatError).extension).toBe('.ini');
    }
    expect(() => loadDocument('experiment')).toThrowError(UnsupportedFormatError);
  });

  it('requires a mapping at the top level', () => {
    expect(() => loadDocument(fixture('sequence.yaml'))).toThrowError(InvalidDocumentError);
  });

  it('treats an empty file as an empty document', () => {
    expect(loadDocument(fixture('empty.yaml'))).toEqual({});
  });

  it('lists the supported extensions', () => {
    expect(SUPPORTED_EXTENSIONS).toEqual(['.json', '.yaml', '.yml', '.toml']);
  });
});

describe('parseDocument', () => {
  it('wraps parser errors', () => {
    expect(() => parseDocument('a: [1, 2', '.yaml')).toThrowError(InvalidDocumentError);
    expect(() => parseDocument('a = ', '.toml')).toThrowError(InvalidDocumentError);
  });

  it('rejects unknown extensions', () => {
    expect(() => parseDocument('a: 1', '.ini')).toThrowError(UnsupportedFormatError);
    expect(() => parseDocument('a: 1', 'constructor')).toThrowError(UnsupportedFormatError);
  });

  it('parses toml tables and arrays', () => {
    expect(parseDocument('[model]\nlayers = [8, 4]\nname = "mlp"\n', '.toml')).toEqual({
      model: { layers: [8, 4], name: 'mlp' },
    });
  });
});

describe('expandHome', () => {
  it('expands a leading tilde only', () => {
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('~/exp.yaml')).toBe(join(homedir(), 'exp.yaml'));
    expect(expandHome('/tmp/~/exp.yaml')).toBe('/tmp/~/exp.yaml');
  });
});

describe('ExperimentConfig from files', () => {
  it('builds the same objects whatever the format', () => {
    const registry = new Registry();
    registry.register(class Adam {
      constructor(readonly kwargs: { lr: number }) {}
    });

    for (const name of ['experiment.yaml', 'experiment.toml', 'experiment.json']) {
      const exp = new ExperimentConfig(fixture(name), { registry, env: { VAR: 5 } });
      expect(exp.getOrBuild('second')).toEqual([5, 'coucou']);
      expect(exp.getOrBuild('optimizer')).toEqual({ kwargs: { lr: 0.01 } });
    }
  });
});
