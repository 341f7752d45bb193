import { beforeEach, describe, expect, it } from 'vitest';

import {
  CyclicBuildError,
  DuplicateAliasError,
  ExperimentConfig,
  Plugin,
  ReadOnlyExperimentError,
  Registry,
  UnknownPluginError,
  registerPlugin,
} from '../src/index.js';

describe('Experiment integration', () => {
  beforeEach(() => {
    Registry.resetGlobalForTests();
  });

  it('builds a mixed document of plugins, references and literals', () => {
    @Plugin()
    class A {
      static g(kwargs: Record<string, unknown>) {
        return kwargs;
      }

      readonly a: number;
      readonly b: number;
      readonly c: number;

      constructor({ a, b = 2, c = 3 }: { a: number; b?: number; c?: number }) {
        this.a = a;
        this.b = b;
        this.c = c;
      }
    }
    registerPlugin(A.g, 'A.g');

    function f({ a, b = 2 }: { a: number; b?: number }) {
      return [a, b];
    }
    registerPlugin(f);

    const exp = new ExperimentConfig(
      {
        test: 'coucou',
        third: '$second',
        second: ['$VAR', '$test'],
        a: { _name: 'A', a: 4, c: 5 },
        pair: { _name: 'f', a: 5 },
        kwargs: { _name: 'A.g', model: '$a', fn: '$f' },
      },
      { env: { VAR: 5 } }
    );

    expect(exp.toObject()).toEqual({
      test: 'coucou',
      second: [5, 'coucou'],
      third: [5, 'coucou'],
      a: { a: 4, b: 2, c: 5 },
      pair: [5, 2],
      kwargs: { model: exp.get('a'), fn: f },
    });
    expect(exp.get('a')).toBeInstanceOf(A);
    expect(Array.from(exp.keys())).toEqual(['test', 'second', 'third', 'a', 'pair', 'kwargs']);
  });

  it('registers each alias once per registry', () => {
    function Adam() {
      return 'adam';
    }
    registerPlugin(Adam);

    expect(() => registerPlugin(function Adam() {}, 'Adam')).toThrowError(DuplicateAliasError);
    expect(Registry.global().lookup('Adam')).toBe(Adam);
  });

  it('resolves substitution variables ahead of aliases and sibling keys', () => {
    registerPlugin(function VAR() {
      return 'from registry';
    });
    const exp = new ExperimentConfig({ VAR: 'from document', out: '$VAR' }, { env: { VAR: 5 } });

    expect(exp.getOrBuild('out')).toBe(5);
  });

  it('fails on self reference instead of recursing', () => {
    expect(() => new ExperimentConfig({ x: '$x' })).toThrowError(CyclicBuildError);

    const exp = new ExperimentConfig({ x: '$x' }, { eager: false });
    expect(() => exp.getOrBuild('x')).toThrowError(CyclicBuildError);
  });

  it('identifies unknown plugins', () => {
    expect(() => new ExperimentConfig({ model: { _name: 'Nope' } })).toThrowError(UnknownPluginError);
    expect(() => new ExperimentConfig({ model: { _name: 'Nope' } })).toThrowError(/Nope/);
  });

  it('keeps the store read-only', () => {
    const exp = new ExperimentConfig({ a: 1 });
    expect(() => exp.set('a', 2)).toThrowError(ReadOnlyExperimentError);
    expect(exp.get('a')).toBe(1);
    expect(exp.size).toBe(1);
  });
});
