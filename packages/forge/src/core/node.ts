/**
 * Scalar leaf of a configuration document.
 */
export type ConfigScalar = string | number | boolean | null;

export interface ConfigMapping {
  readonly [key: string]: ConfigNode;
}

export type ConfigSequence = readonly ConfigNode[];

/**
 * One unit of a configuration document: a mapping, a sequence or a scalar.
 */
export type ConfigNode = ConfigScalar | ConfigMapping | ConfigSequence;

/**
 * A whole configuration document. The top level is always a mapping whose
 * keys are the objects an experiment can build.
 */
export type ConfigDocument = ConfigMapping;

export function isMapping(node: unknown): node is ConfigMapping {
  if (typeof node !== 'object' || node === null || Array.isArray(node)) return false;
  const proto: unknown = Object.getPrototypeOf(node);
  return proto === Object.prototype || proto === null;
}

export function isSequence(node: unknown): node is ConfigSequence {
  return Array.isArray(node);
}

export function isScalar(node: unknown): node is ConfigScalar {
  return (
    node === null ||
    typeof node === 'string' ||
    typeof node === 'number' ||
    typeof node === 'boolean'
  );
}

/**
 * Recursively freeze a document so that nothing can mutate it after load.
 * Returns the same reference.
 */
export function freezeDocument<T extends ConfigNode>(node: T): T {
  if (isSequence(node)) {
    node.forEach((child) => freezeDocument(child));
    Object.freeze(node);
    return node;
  }
  if (isMapping(node)) {
    Object.values(node).forEach((child) => freezeDocument(child));
    Object.freeze(node);
    return node;
  }
  return node;
}

/**
 * Join a build path and a child segment: `childPath('a', 'b')` → `a.b`,
 * `childPath('a.list', 2)` → `a.list.2`.
 */
export function childPath(parent: string, segment: string | number): string {
  return parent ? `${parent}.${segment}` : String(segment);
}

/**
 * Short printable form of a node, used in traces.
 */
export function describeNode(node: unknown, maxLength = 60): string {
  let text: string;
  try {
    text = JSON.stringify(node) ?? String(node);
  } catch {
    text = String(node);
  }
  return text.length > maxLength ? `${text.slice(0, maxLength - 1)}…` : text;
}
