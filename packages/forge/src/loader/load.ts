/*
 * Document loader
 * ---------------
 * Turns a `DocumentSource` into a frozen `ConfigDocument`:
 *  - an in-memory mapping is copied (the caller's object is never frozen)
 *  - a path is read synchronously and parsed by extension:
 *      .json .yaml .yml → yaml (YAML 1.2 is a superset of JSON)
 *      .toml            → smol-toml
 *
 * Parsed values outside the node model are normalized: TOML dates become ISO
 * strings, bigints become numbers when they fit. Anything else that is not a
 * mapping, sequence or scalar is rejected with `InvalidDocumentError`.
 */
import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { extname, join } from 'node:path';

import { parse as parseToml } from 'smol-toml';
import { parse as parseYaml } from 'yaml';

import { InvalidDocumentError, UnsupportedFormatError } from '../errors/errors.js';
import { freezeDocument, isMapping, isSequence, isScalar } from '../core/node.js';
import type { ConfigDocument, ConfigMapping, ConfigNode } from '../core/node.js';
import type { DocumentSource } from '../types/types.js';

type Parser = (text: string) => unknown;

const PARSERS: Readonly<Record<string, Parser>> = {
  '.json': (text) => parseYaml(text),
  '.yaml': (text) => parseYaml(text),
  '.yml': (text) => parseYaml(text),
  '.toml': (text) => parseToml(text),
};

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(PARSERS);

/**
 * Expand a leading `~` to the current user's home directory.
 */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Load a configuration document.
 *
 * @param source - In-memory document, or path to a supported file
 * @throws UnsupportedFormatError for an unknown file extension
 * @throws InvalidDocumentError when the top level is not a mapping or a value
 *         has no counterpart in the node model
 */
export function loadDocument(source: DocumentSource): ConfigDocument {
  if (typeof source !== 'string') {
    return freezeDocument(toDocument(source, '<in-memory>'));
  }

  const path = expandHome(source);
  const extension = extname(path).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.includes(extension)) {
    throw new UnsupportedFormatError(source, extension);
  }

  return parseDocument(readFileSync(path, 'utf8'), extension, source);
}

/**
 * Parse document text already in memory.
 *
 * @param text - Serialized document
 * @param extension - One of {@link SUPPORTED_EXTENSIONS}, selecting the parser
 * @param source - Name used in error messages
 */
export function parseDocument(text: string, extension: string, source = '<text>'): ConfigDocument {
  const parser = Object.prototype.hasOwnProperty.call(PARSERS, extension)
    ? PARSERS[extension]
    : undefined;
  if (!parser) throw new UnsupportedFormatError(source, extension);

  let raw: unknown;
  try {
    raw = parser(text);
  } catch (e) {
    throw new InvalidDocumentError(source, e instanceof Error ? e.message : String(e));
  }
  // An empty YAML file parses to null.
  return freezeDocument(toDocument(raw ?? {}, source));
}

function toDocument(raw: unknown, source: string): ConfigDocument {
  if (!isMapping(raw)) {
    throw new InvalidDocumentError(source, 'the top level must be a mapping of keys to objects.');
  }
  return toMapping(raw, source, '');
}

function toMapping(raw: ConfigMapping, source: string, path: string): ConfigMapping {
  // Own properties only: assigning `__proto__` on a literal would set the prototype
  return Object.fromEntries(
    Object.entries(raw).map(([key, value]): [string, ConfigNode] => [
      key,
      toNode(value, source, path ? `${path}.${key}` : key),
    ])
  );
}

function toNode(value: unknown, source: string, path: string): ConfigNode {
  if (isScalar(value)) return value;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'bigint') {
    if (value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)) {
      return Number(value);
    }
    return value.toString();
  }
  if (isSequence(value)) return value.map((child, i) => toNode(child, source, `${path}.${i}`));
  if (isMapping(value)) return toMapping(value, source, path);
  throw new InvalidDocumentError(
    source,
    `value at "${path}" is a ${typeof value}, expected a mapping, sequence or scalar.`
  );
}
