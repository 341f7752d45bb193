/* ExperimentConfig
 *
 * Owns a configuration document and the objects built from it. Every
 * top-level key is built during construction, in document order, unless
 * `eager: false` defers each key to its first `getOrBuild`. Building goes
 * through an `ObjectBuilder` whose reference namespaces are, in priority order:
 *
 *   1. substitution variables  (`env` option)
 *   2. the plugin registry
 *   3. this experiment         (sibling keys, built on demand)
 *
 * Lifecycle of a key: declared → building → built, or declared → building →
 * failed. Built values are cached for good; the store only grows.
 *
 * Cycle detection: `building` is the stack of keys whose build has started
 * and not finished. Asking for a key already on the stack means the key needs
 * its own value, and fails with `CyclicBuildError` before any recursive work.
 * On failure the key leaves the stack; with failurePolicy 'poison' it is also
 * remembered, so later reads fail as cyclic instead of retrying.
 *
 * The read surface is a `ReadonlyMap` over built objects only. `get`, `has`,
 * `size` and iteration never trigger a build; `getOrBuild` does. Writes
 * throw `ReadOnlyExperimentError`.
 */
import {
  AlreadyBuiltError,
  CyclicBuildError,
  InvalidExperimentOptionsError,
  ReadOnlyExperimentError,
  UnknownKeyError,
} from '../errors/errors.js';
import { loadDocument } from '../loader/load.js';
import { Registry } from '../registry/registry.js';
import {
  FailurePolicy,
  type BuildTrace,
  type DocumentSource,
  type ExperimentOptions,
} from '../types/types.js';
import { recordNamespace, type Namespace } from './namespace.js';
import type { ConfigDocument } from './node.js';
import { ObjectBuilder } from './object-builder.js';

const DEFAULT_TYPE_KEY = '_name';
const DEFAULT_SENTINEL = '$';

interface ResolvedOptions {
  env: Readonly<Record<string, unknown>>;
  registry: Registry;
  typeKey: string;
  sentinel: string;
  eager: boolean;
  failurePolicy: FailurePolicy;
  trace?: BuildTrace;
}

export class ExperimentConfig implements ReadonlyMap<string, unknown> {
  /** Frozen source document */
  readonly document: ConfigDocument;
  readonly builder: ObjectBuilder;

  private readonly store = new Map<string, unknown>();
  private readonly building: string[] = [];
  private readonly poisoned = new Set<string>();
  private readonly failurePolicy: FailurePolicy;

  /**
   * @param source - Document, or path to a `.json`, `.yaml`, `.yml` or `.toml` file
   * @param options - See {@link ExperimentOptions}
   *
   * @example
   * ```typescript
   * const exp = new ExperimentConfig(
   *   { second: ['$VAR', '$test'], test: 'coucou' },
   *   { env: { VAR: 5 } }
   * );
   * exp.getOrBuild('second'); // [5, 'coucou']
   * ```
   */
  constructor(source: DocumentSource, options: ExperimentOptions = {}) {
    const cfg = ExperimentConfig.validateOptions(options);

    this.document = loadDocument(source);
    this.failurePolicy = cfg.failurePolicy;
    this.builder = ObjectBuilder.standard({
      registry: cfg.registry,
      namespaces: [
        recordNamespace('Environment', cfg.env),
        cfg.registry.asNamespace(),
        this.asNamespace(),
      ],
      typeKey: cfg.typeKey,
      sentinel: cfg.sentinel,
      trace: cfg.trace,
    });

    if (cfg.eager) this.buildAll();
  }

  private static validateOptions(options: ExperimentOptions): ResolvedOptions {
    if (typeof options !== 'object' || options === null) {
      throw new InvalidExperimentOptionsError('options must be an object.');
    }
    const { env = {}, typeKey = DEFAULT_TYPE_KEY, sentinel = DEFAULT_SENTINEL } = options;
    const failurePolicy = options.failurePolicy ?? FailurePolicy.Release;

    if (typeof env !== 'object' || env === null || Array.isArray(env)) {
      throw new InvalidExperimentOptionsError(`'env' must be a record of substitution variables.`);
    }
    if (options.registry !== undefined && !(options.registry instanceof Registry)) {
      throw new InvalidExperimentOptionsError(`'registry' must be a Registry instance.`);
    }
    if (typeof typeKey !== 'string' || typeKey.length === 0) {
      throw new InvalidExperimentOptionsError(`'typeKey' must be a non-empty string.`);
    }
    if (typeof sentinel !== 'string' || sentinel.length === 0) {
      throw new InvalidExperimentOptionsError(`'sentinel' must be a non-empty string.`);
    }
    if (failurePolicy !== FailurePolicy.Release && failurePolicy !== FailurePolicy.Poison) {
      throw new InvalidExperimentOptionsError(
        `'failurePolicy' must be '${FailurePolicy.Release}' or '${FailurePolicy.Poison}'.`
      );
    }
    if (options.trace !== undefined && typeof options.trace !== 'function') {
      throw new InvalidExperimentOptionsError(`'trace' must be a function.`);
    }

    return {
      env,
      registry: options.registry ?? Registry.global(),
      typeKey,
      sentinel,
      eager: options.eager ?? true,
      failurePolicy,
      trace: options.trace,
    };
  }

  // ---- building ----

  /**
   * Return the object for `key`, building it (and whatever it references) on
   * first access.
   *
   * @throws UnknownKeyError if the document does not declare `key`
   * @throws CyclicBuildError if `key` is already being built
   */
  getOrBuild(key: string): unknown {
    if (this.store.has(key)) return this.store.get(key);
    return this.build(key);
  }

  /**
   * Build `key` now. Prefer {@link getOrBuild}, which consults the cache.
   *
   * @throws AlreadyBuiltError if `key` has already been built
   * @throws UnknownKeyError if the document does not declare `key`
   * @throws CyclicBuildError if `key` is already being built
   */
  build(key: string): unknown {
    if (this.store.has(key)) throw new AlreadyBuiltError(key);
    if (!this.isDeclared(key)) throw new UnknownKeyError(key, this.declaredKeys());

    if (this.building.includes(key)) {
      const cycle = this.building.slice(this.building.indexOf(key)).concat(key);
      throw new CyclicBuildError(cycle);
    }
    if (this.poisoned.has(key)) throw new CyclicBuildError([key, key]);

    this.building.push(key);
    let built = false;
    try {
      const value = this.builder.instantiate(this.document[key], key);
      this.store.set(key, value);
      built = true;
      return value;
    } finally {
      this.building.pop();
      if (!built && this.failurePolicy === FailurePolicy.Poison) this.poisoned.add(key);
    }
  }

  /**
   * Build every declared key in document order. Keys already built, including
   * those built as a side effect of an earlier key, are skipped.
   */
  buildAll(): this {
    for (const key of Object.keys(this.document)) {
      if (!this.store.has(key)) this.build(key);
    }
    return this;
  }

  /**
   * Top-level keys of the document, built or not.
   */
  declaredKeys(): string[] {
    return Object.keys(this.document);
  }

  isDeclared(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.document, key);
  }

  isBuilt(key: string): boolean {
    return this.store.has(key);
  }

  isBuilding(key: string): boolean {
    return this.building.includes(key);
  }

  /**
   * Namespace over this experiment: every declared key resolves, building it
   * on demand.
   */
  asNamespace(): Namespace {
    return {
      name: 'Experiment objects',
      has: (key) => this.isDeclared(key),
      get: (key) => this.getOrBuild(key),
    };
  }

  // ---- read-only map surface (built objects only) ----

  get size(): number {
    return this.store.size;
  }

  /**
   * Built object for `key`, or `defaultValue`. Never builds.
   */
  get(key: string, defaultValue?: unknown): unknown {
    return this.store.has(key) ? this.store.get(key) : defaultValue;
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  keys() {
    return this.store.keys();
  }

  values() {
    return this.store.values();
  }

  entries() {
    return this.store.entries();
  }

  forEach(
    callbackfn: (value: unknown, key: string, map: ReadonlyMap<string, unknown>) => void,
    thisArg?: unknown
  ): void {
    this.store.forEach((value, key) => callbackfn.call(thisArg, value, key, this));
  }

  [Symbol.iterator]() {
    return this.store.entries();
  }

  /**
   * Plain snapshot of the built objects.
   */
  toObject(): Record<string, unknown> {
    return Object.fromEntries(this.store);
  }

  set(key: string, _value: unknown): never {
    throw new ReadOnlyExperimentError(`set('${key}')`);
  }

  delete(key: string): never {
    throw new ReadOnlyExperimentError(`delete('${key}')`);
  }

  clear(): never {
    throw new ReadOnlyExperimentError('clear()');
  }
}
