/* CallableInstantiator
 *
 * Claims mappings that carry the type key (`_name` by default) and turns them
 * into a plugin call:
 *
 *   { _name: 'Adam', lr: 0.01, params: '$params' }
 *     → new Adam({ lr: 0.01, params: <built $params> })
 *
 * Behavior contract
 *  - The alias is resolved before any argument is built, so an unknown alias
 *    fails fast with `UnknownPluginError`.
 *  - Arguments are built depth-first in document order, each at `path.key`.
 *  - Anything the plugin throws is wrapped in `InstantiationError` with the
 *    build path and alias. Errors of this package coming from nested builds
 *    are rethrown as they are, so a failure is reported once, at the level
 *    where it happened.
 */
import { InstantiationError, InvalidTypeKeyError, KilnError } from '../../errors/errors.js';
import { invokeEntry, type Registry } from '../../registry/registry.js';
import type { PluginArgs } from '../../types/types.js';
import { childPath, isMapping, type ConfigNode } from '../node.js';
import { DECLINED, accept, type BuildAttempt, type Instantiator, type NodeBuilder } from './instantiator.js';

export class CallableInstantiator implements Instantiator {
  readonly kind = 'callable';

  constructor(
    private readonly registry: Registry,
    private readonly typeKey = '_name'
  ) {}

  tryBuild(node: ConfigNode, path: string, builder: NodeBuilder): BuildAttempt {
    if (!isMapping(node) || !Object.prototype.hasOwnProperty.call(node, this.typeKey)) {
      return DECLINED;
    }

    const alias = node[this.typeKey];
    if (typeof alias !== 'string') throw new InvalidTypeKeyError(path, this.typeKey, alias);

    const entry = this.registry.entry(alias);

    builder.emit({ path, kind: 'callable', detail: `calling ${alias}` });

    const args: PluginArgs = Object.fromEntries(
      Object.entries(node)
        .filter(([key]) => key !== this.typeKey)
        .map(([key, child]): [string, unknown] => [
          key,
          builder.instantiate(child, childPath(path, key)),
        ])
    );

    try {
      return accept(invokeEntry(entry, args));
    } catch (e) {
      if (e instanceof KilnError) throw e;
      throw new InstantiationError(path, alias, e);
    }
  }
}
