import { childPath, isMapping, type ConfigNode } from '../node.js';
import { DECLINED, accept, type BuildAttempt, type Instantiator, type NodeBuilder } from './instantiator.js';

/**
 * Builds a plain mapping: every value is built, keys are preserved.
 *
 * Mappings carrying the type key are claimed earlier in the chain by the
 * callable instantiator; this one declines them as well so it stays correct
 * when used on its own.
 */
export class DictInstantiator implements Instantiator {
  readonly kind = 'dict';

  constructor(private readonly typeKey?: string) {}

  tryBuild(node: ConfigNode, path: string, builder: NodeBuilder): BuildAttempt {
    if (!isMapping(node)) return DECLINED;
    if (this.typeKey !== undefined && Object.prototype.hasOwnProperty.call(node, this.typeKey)) {
      return DECLINED;
    }

    builder.emit({ path, kind: 'dict', detail: 'as a dictionary' });

    // fromEntries defines own properties, so a `__proto__` key stays a key
    const out: Record<string, unknown> = Object.fromEntries(
      Object.entries(node).map(([key, child]): [string, unknown] => [
        key,
        builder.instantiate(child, childPath(path, key)),
      ])
    );
    return accept(out);
  }
}
