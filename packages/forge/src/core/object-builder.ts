/* ObjectBuilder
 *
 * Dispatches a config node to the first instantiator in its chain that
 * accepts it. When every instantiator declines, the node is returned as is:
 * this is how numbers, booleans, null and plain strings pass through.
 *
 * Chain order is part of the contract. `standard()` builds the canonical one:
 *
 *   1. callable   mapping with the type key   → plugin call
 *   2. dict       any other mapping           → mapping of built values
 *   3. list       sequence                    → array of built values
 *   4. reference  "$KEY" in the environment
 *   5. reference  "$KEY" in the registry
 *   6. reference  "$KEY" in the experiment's own objects
 *
 * Mappings with a type key must reach the callable instantiator before the
 * dict instantiator, and substitution variables shadow registry aliases,
 * which shadow experiment keys.
 */
import type { BuildEvent, BuildTrace } from '../types/types.js';
import {
  CallableInstantiator,
  DictInstantiator,
  ListInstantiator,
  ReferenceInstantiator,
  type Instantiator,
  type NodeBuilder,
} from './instantiators/index.js';
import type { Namespace } from './namespace.js';
import { describeNode, type ConfigNode } from './node.js';
import type { Registry } from '../registry/registry.js';

export interface ObjectBuilderOptions {
  trace?: BuildTrace;
}

export interface StandardChainOptions extends ObjectBuilderOptions {
  registry: Registry;
  /** Reference namespaces in priority order, highest first */
  namespaces: readonly Namespace[];
  typeKey?: string;
  sentinel?: string;
}

export class ObjectBuilder implements NodeBuilder {
  readonly instantiators: readonly Instantiator[];
  private readonly trace?: BuildTrace;

  constructor(instantiators: readonly Instantiator[], options: ObjectBuilderOptions = {}) {
    this.instantiators = Object.freeze([...instantiators]);
    this.trace = options.trace;
  }

  /**
   * Build the canonical six-member chain around a registry and reference
   * namespaces.
   */
  static standard(options: StandardChainOptions): ObjectBuilder {
    const { registry, namespaces, typeKey, sentinel } = options;
    return new ObjectBuilder(
      [
        new CallableInstantiator(registry, typeKey),
        new DictInstantiator(typeKey ?? '_name'),
        new ListInstantiator(),
        ...namespaces.map((ns) => new ReferenceInstantiator(ns, sentinel)),
      ],
      options
    );
  }

  /**
   * Build one node.
   *
   * @param node - Raw config node
   * @param path - Dotted path used for diagnostics only, e.g. `model.layers.2`
   */
  instantiate(node: ConfigNode, path: string): unknown {
    for (const instantiator of this.instantiators) {
      const attempt = instantiator.tryBuild(node, path, this);
      if (attempt.accepted) return attempt.value;
    }

    this.emit({ path, kind: 'scalar', detail: `as a simple object, ${describeNode(node)}` });
    return node;
  }

  emit(event: BuildEvent): void {
    this.trace?.(event);
  }
}
