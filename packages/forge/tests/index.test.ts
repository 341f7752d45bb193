import { describe, expect, it } from 'vitest';

import {
  CyclicBuildError,
  ExperimentConfig,
  FailurePolicy,
  ObjectBuilder,
  Plugin,
  PluginKind,
  Registry,
  loadDocument,
  registerPlugin,
} from '../src/index.js';
import { ExperimentConfig as ExperimentConfigImpl } from '../src/core/experiment-config.js';
import { ObjectBuilder as ObjectBuilderImpl } from '../src/core/object-builder.js';
import { CyclicBuildError as CyclicBuildErrorImpl } from '../src/errors/errors.js';
import { Registry as RegistryImpl } from '../src/registry/registry.js';

describe('package public index', () => {
  it('re-exports core api surface', () => {
    expect(ExperimentConfig).toBe(ExperimentConfigImpl);
    expect(ObjectBuilder).toBe(ObjectBuilderImpl);
    expect(Registry).toBe(RegistryImpl);
    expect(CyclicBuildError).toBe(CyclicBuildErrorImpl);
    expect(FailurePolicy).toEqual({ Release: 'release', Poison: 'poison' });
    expect(PluginKind).toEqual({ Class: 'class', Function: 'function' });
    expect(typeof Plugin).toBe('function');
    expect(typeof registerPlugin).toBe('function');
    expect(typeof loadDocument).toBe('function');
  });
});
