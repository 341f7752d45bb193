/*
 * Registry
 * --------
 * Alias → plugin table consulted by the callable instantiator (for `_name`
 * keys) and by the registry reference namespace (for `"$Alias"` scalars).
 *
 * Invariants
 *  - An alias is bound at most once for the registry's lifetime; a second
 *    registration throws `DuplicateAliasError` and leaves the first intact.
 *  - There is no removal API. Tests swap the whole global instance through
 *    `resetGlobalForTests()` instead.
 *  - Entries are frozen when stored.
 *
 * A process-wide default lives on globalThis (see types/global.d.ts) so that
 * decorators evaluated at import time and experiments built later agree on
 * one instance. Experiments take a registry explicitly and only fall back to
 * the global one.
 */
import type { Namespace } from '../core/namespace.js';
import { DuplicateAliasError, InvalidAliasError, UnknownPluginError } from '../errors/errors.js';
import {
  PluginKind,
  type Constructor,
  type PluginEntity,
  type PluginArgs,
  type RegistryEntry,
} from '../types/types.js';

/** Matches the printed source of an ES class. */
const CLASS_SOURCE = /^class[\s{]/;

/**
 * Type guard deciding whether a plugin must be invoked with `new`.
 *
 * @param plugin - Registered entity
 * @param kind - Explicit invocation style; source inspection is used when omitted
 */
export function isConstructor(plugin: PluginEntity, kind?: PluginKind): plugin is Constructor {
  if (kind) return kind === PluginKind.Class;
  return CLASS_SOURCE.test(Function.prototype.toString.call(plugin));
}

/**
 * Invoke a registry entry with keyword arguments.
 */
export function invokeEntry(entry: RegistryEntry, args: PluginArgs): unknown {
  const { entity } = entry;
  if (isConstructor(entity, entry.kind)) return new entity(args);
  return entity(args);
}

export class Registry {
  /** Primary storage: alias -> entry, in registration order */
  private readonly entries = new Map<string, RegistryEntry>();

  constructor(private readonly name = 'Registry') {}

  /**
   * Process-wide default registry, created on first use.
   */
  static global(): Registry {
    return (globalThis.__KILN_REGISTRY__ ??= new Registry('Global registry'));
  }

  /**
   * Replace the process-wide registry with an empty one.
   *
   * ⚠️ For test environments only. Plugins decorated at import time are lost.
   */
  static resetGlobalForTests(): Registry {
    globalThis.__KILN_REGISTRY__ = new Registry('Global registry');
    return globalThis.__KILN_REGISTRY__;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Register a plugin under an alias.
   *
   * Returns the entity unchanged so the call can wrap a definition:
   * `const f = registry.register(function f({ a }) { ... })`.
   *
   * The default alias is `entity.name`. Anonymous functions have none, and
   * minifiers or transpilers may rename a function or class (`Adam` becoming
   * `Adam2`), so pass `alias` explicitly when the name must be stable.
   *
   * @param entity - Class or function to register
   * @param alias - Lookup key; defaults to the entity's own name
   * @param kind - Invocation style; inferred when omitted
   * @throws InvalidAliasError if no usable alias can be determined
   * @throws DuplicateAliasError if the alias is already taken
   */
  register<T extends PluginEntity>(entity: T, alias?: string, kind?: PluginKind): T {
    const resolvedAlias = alias ?? entity.name;
    if (typeof resolvedAlias !== 'string' || resolvedAlias.length === 0) {
      throw new InvalidAliasError(resolvedAlias);
    }

    const existing = this.entries.get(resolvedAlias);
    if (existing) {
      throw new DuplicateAliasError(resolvedAlias, existing.label, entity.name || resolvedAlias);
    }

    const entry: RegistryEntry = Object.freeze({
      alias: resolvedAlias,
      entity,
      kind: kind ?? (isConstructor(entity) ? PluginKind.Class : PluginKind.Function),
      label: entity.name || resolvedAlias,
    });
    this.entries.set(resolvedAlias, entry);
    return entity;
  }

  /**
   * Retrieve the entity registered under `alias`.
   *
   * @throws UnknownPluginError if the alias is not registered
   */
  lookup(alias: string): PluginEntity {
    return this.entry(alias).entity;
  }

  /**
   * Retrieve the full entry registered under `alias`.
   *
   * @throws UnknownPluginError if the alias is not registered
   */
  entry(alias: string): RegistryEntry {
    const entry = this.entries.get(alias);
    if (!entry) throw new UnknownPluginError(alias, this.aliases());
    return entry;
  }

  has(alias: string): boolean {
    return this.entries.has(alias);
  }

  /**
   * Registered aliases in registration order.
   */
  aliases(): string[] {
    return Array.from(this.entries.keys());
  }

  *values(): IterableIterator<RegistryEntry> {
    yield* this.entries.values();
  }

  /**
   * Read-only view used by the reference instantiator. References resolve to
   * the registered entity itself, not to an instance.
   */
  asNamespace(): Namespace {
    return {
      name: this.name,
      has: (key) => this.has(key),
      get: (key) => this.lookup(key),
    };
  }
}
