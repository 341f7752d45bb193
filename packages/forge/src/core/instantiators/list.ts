import { childPath, isSequence, type ConfigNode } from '../node.js';
import { DECLINED, accept, type BuildAttempt, type Instantiator, type NodeBuilder } from './instantiator.js';

/**
 * Builds a sequence element by element, preserving order.
 */
export class ListInstantiator implements Instantiator {
  readonly kind = 'list';

  tryBuild(node: ConfigNode, path: string, builder: NodeBuilder): BuildAttempt {
    if (!isSequence(node)) return DECLINED;

    builder.emit({ path, kind: 'list', detail: 'as a list' });

    return accept(node.map((child, i) => builder.instantiate(child, childPath(path, i))));
  }
}
