import type { ConfigNode } from '../node.js';
import type { BuildEvent } from '../../types/types.js';

/**
 * Outcome of offering a node to one instantiator.
 *
 * Declining is a control signal, not an error: the builder moves on to the
 * next instantiator in the chain.
 */
export type BuildAttempt =
  | { readonly accepted: true; readonly value: unknown }
  | { readonly accepted: false };

/** Shared declined value; allocation-free. */
export const DECLINED: BuildAttempt = Object.freeze({ accepted: false });

export function accept(value: unknown): BuildAttempt {
  return { accepted: true, value };
}

export type InstantiatorKind = 'callable' | 'dict' | 'list' | 'reference';

/**
 * Callback surface an instantiator uses to build child nodes and report
 * progress. Implemented by `ObjectBuilder`.
 */
export interface NodeBuilder {
  instantiate(node: ConfigNode, path: string): unknown;
  emit(event: BuildEvent): void;
}

/**
 * One strategy in the builder chain.
 *
 * Contract: `tryBuild` either returns `DECLINED` without side effects, or
 * accepts and returns the built value. It throws only for real failures
 * (unknown plugin, failing plugin, cyclic build).
 */
export interface Instantiator {
  readonly kind: InstantiatorKind;
  tryBuild(node: ConfigNode, path: string, builder: NodeBuilder): BuildAttempt;
}
