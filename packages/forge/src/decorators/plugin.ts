import { Registry } from '../registry/registry.js';
import type { Constructor, PluginEntity, PluginOptions } from '../types/types.js';

/**
 * Registers a class as a plugin at class-definition time.
 *
 * The class is invoked as `new Klass(kwargs)` where `kwargs` holds every
 * sibling of the type key, already built.
 *
 * @param alias - Lookup key used in documents; defaults to the class name,
 *   which a minifier or transpiler may rename, so give one for published code
 * @param options.registry - Target registry (defaults to the global one)
 * @param options.kind - Invocation style override
 *
 * @returns Class decorator function
 *
 * @example
 * ```typescript
 * @Plugin()
 * class Adam {
 *   constructor({ lr = 0.001 }: { lr?: number }) {}
 * }
 *
 * @Plugin('LinearWarmup', { registry })
 * class Warmup {}
 * ```
 */
export function Plugin(alias?: string, options: PluginOptions = {}) {
  return <T extends Constructor>(target: T): void => {
    (options.registry ?? Registry.global()).register(target, alias, options.kind);
  };
}

/**
 * Function form of {@link Plugin} for plain functions and static methods.
 * Returns the entity unchanged.
 *
 * @example
 * ```typescript
 * export const relu = registerPlugin(function relu({ x }: { x: number }) {
 *   return Math.max(0, x);
 * });
 * registerPlugin(A.g, 'A.g');
 * ```
 */
export function registerPlugin<T extends PluginEntity>(
  entity: T,
  alias?: string,
  options: PluginOptions = {}
): T {
  return (options.registry ?? Registry.global()).register(entity, alias, options.kind);
}
