import type { Registry } from '../registry/registry.js';
import type { ConfigDocument } from '../core/node.js';

/**
 * Generic constructor signature for class plugins.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Plain function (or static method) plugin.
 *
 * @template T - Type returned by the function
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type PluginFunction<T = any> = (...args: any[]) => T;

/**
 * Anything that can be registered under an alias and invoked from a
 * configuration document.
 */
export type PluginEntity = Constructor | PluginFunction;

/**
 * How a registered plugin is invoked:
 *   - **Class**: `new Plugin(kwargs)`
 *   - **Function**: `plugin(kwargs)`
 *
 * Detected from the function source when not given at registration. Native
 * classes (`Map`, `Date`, ...) print as plain functions and must be
 * registered with `kind: PluginKind.Class`.
 */
export const PluginKind = {
  Class: 'class',
  Function: 'function',
} as const;

export type PluginKindType = (typeof PluginKind)[keyof typeof PluginKind];
export type PluginKind = PluginKindType;

/**
 * Keyword arguments handed to a plugin: every sibling of the type key,
 * already built.
 */
export type PluginArgs = Record<string, unknown>;

export interface PluginOptions {
  /** Registry receiving the plugin. Defaults to {@link Registry.global}. */
  registry?: Registry;
  /** Invocation style. Inferred when omitted. */
  kind?: PluginKind;
}

/**
 * Immutable record stored for each alias.
 */
export interface RegistryEntry {
  readonly alias: string;
  readonly entity: PluginEntity;
  readonly kind: PluginKind;
  /** Human-readable name used in diagnostics */
  readonly label: string;
}

/**
 * What happens to a key whose build throws.
 *   - **release**: the in-progress mark is dropped, a later read retries
 *   - **poison**: the mark stays, a later read throws `CyclicBuildError`
 */
export const FailurePolicy = {
  Release: 'release',
  Poison: 'poison',
} as const;

export type FailurePolicyType = (typeof FailurePolicy)[keyof typeof FailurePolicy];
export type FailurePolicy = FailurePolicyType;

/**
 * Which strategy produced a value.
 */
export type BuildKind = 'callable' | 'dict' | 'list' | 'reference' | 'scalar';

export interface BuildEvent {
  /** Dotted build path, e.g. `model.layers.2` */
  path: string;
  kind: BuildKind;
  /** Alias, namespace or value summary depending on `kind` */
  detail: string;
}

export type BuildTrace = (event: BuildEvent) => void;

/**
 * Options accepted by `ExperimentConfig`.
 */
export interface ExperimentOptions {
  /** Substitution variables, the highest-priority reference namespace */
  env?: Readonly<Record<string, unknown>>;
  registry?: Registry;
  /** Mapping key naming the plugin to call. Defaults to `_name`. */
  typeKey?: string;
  /** First character marking a reference scalar. Defaults to `$`. */
  sentinel?: string;
  /** Build every declared key during construction. Defaults to `true`; `false` builds on first access. */
  eager?: boolean;
  failurePolicy?: FailurePolicy;
  /** Receives one event per value produced by the builder */
  trace?: BuildTrace;
}

/**
 * Input accepted where a document is expected: the document itself or a path
 * to a `.json`, `.yaml`, `.yml` or `.toml` file.
 */
export type DocumentSource = ConfigDocument | string;
