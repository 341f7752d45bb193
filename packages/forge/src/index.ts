export { ExperimentConfig } from './core/experiment-config.js';
export { ObjectBuilder } from './core/object-builder.js';
export type { ObjectBuilderOptions, StandardChainOptions } from './core/object-builder.js';

export {
  CallableInstantiator,
  DECLINED,
  DictInstantiator,
  ListInstantiator,
  ReferenceInstantiator,
  accept,
} from './core/instantiators/index.js';
export type {
  BuildAttempt,
  Instantiator,
  InstantiatorKind,
  NodeBuilder,
} from './core/instantiators/index.js';

export { recordNamespace } from './core/namespace.js';
export type { Namespace } from './core/namespace.js';

export { childPath, describeNode, freezeDocument, isMapping, isScalar, isSequence } from './core/node.js';
export type {
  ConfigDocument,
  ConfigMapping,
  ConfigNode,
  ConfigScalar,
  ConfigSequence,
} from './core/node.js';

export { Plugin, registerPlugin } from './decorators/plugin.js';
export { Registry, invokeEntry, isConstructor } from './registry/registry.js';

export { SUPPORTED_EXTENSIONS, expandHome, loadDocument, parseDocument } from './loader/load.js';
export { consoleTracer, formatBuildEvent } from './logging/console-tracer.js';

export { FailurePolicy, PluginKind } from './types/types.js';
export type {
  BuildEvent,
  BuildKind,
  BuildTrace,
  Constructor,
  DocumentSource,
  ExperimentOptions,
  PluginArgs,
  PluginEntity,
  PluginFunction,
  PluginOptions,
  RegistryEntry,
} from './types/types.js';

// Errors
export {
  AlreadyBuiltError,
  CyclicBuildError,
  DuplicateAliasError,
  InstantiationError,
  InvalidAliasError,
  InvalidDocumentError,
  InvalidExperimentOptionsError,
  InvalidTypeKeyError,
  KilnError,
  ReadOnlyExperimentError,
  UnknownKeyError,
  UnknownPluginError,
  UnsupportedFormatError,
} from './errors/errors.js';
