import type { Namespace } from '../namespace.js';
import type { ConfigNode } from '../node.js';
import { DECLINED, accept, type BuildAttempt, type Instantiator, type NodeBuilder } from './instantiator.js';

/**
 * Resolves reference scalars (`"$KEY"`) against one namespace.
 *
 * The builder holds one instance per namespace, in priority order; an
 * instance declines when its namespace lacks the key, which lets the next
 * namespace (and finally scalar passthrough) have a go. The value found is
 * returned verbatim, never built again.
 *
 * There is no escape syntax: a literal string starting with the sentinel that
 * matches no namespace passes through unchanged, one that matches is replaced.
 */
export class ReferenceInstantiator implements Instantiator {
  readonly kind = 'reference';

  constructor(
    readonly namespace: Namespace,
    private readonly sentinel = '$'
  ) {}

  tryBuild(node: ConfigNode, path: string, builder: NodeBuilder): BuildAttempt {
    if (typeof node !== 'string' || !node.startsWith(this.sentinel)) return DECLINED;

    const key = node.slice(this.sentinel.length);
    if (!this.namespace.has(key)) return DECLINED;

    builder.emit({
      path,
      kind: 'reference',
      detail: `using key ${node} in ${this.namespace.name}`,
    });
    return accept(this.namespace.get(key));
  }
}
