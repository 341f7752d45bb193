const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describeValue = (value: unknown): string => {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
};

/**
 * Base class for every error raised by the build engine.
 *
 * The callable instantiator lets these through untouched, so an error raised
 * deep inside a nested build reaches the caller with its original context.
 */
export class KilnError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'KilnError';
  }
}

/**
 * Plugin alias not found in the registry
 */
export class UnknownPluginError extends KilnError {
  constructor(
    public alias: string,
    public availablePlugins: string[] = []
  ) {
    const parts: string[] = [`Plugin '${alias}' is not registered.`, ''];

    if (availablePlugins.length > 0 && availablePlugins.length <= 10) {
      parts.push('Registered plugins:');
      availablePlugins.forEach((p) => parts.push(`  - ${p}`));
      parts.push('');
    } else if (availablePlugins.length > 10) {
      parts.push(`${availablePlugins.length} plugins are registered.`, '');
    }

    parts.push('To fix this:');
    parts.push(`  1. Decorate the class with @Plugin() or call registerPlugin(fn, '${alias}')`);
    parts.push(`  2. Make sure the module that registers it is imported before building`);
    parts.push(`  3. Check the spelling of '${alias}' (aliases are case-sensitive)`);

    super(format(`Plugin '${alias}' is not registered.`, parts));
    this.name = 'UnknownPluginError';
  }
}

export class DuplicateAliasError extends KilnError {
  constructor(
    public alias: string,
    public existing: string,
    public attempted: string
  ) {
    const dev = [
      'Duplicate plugin alias',
      '',
      `Alias '${alias}' is already registered to '${existing}', cannot register '${attempted}'.`,
      '',
      'Pass an explicit alias: registerPlugin(fn, "OtherName") or @Plugin("OtherName").',
    ];
    super(format(`Alias '${alias}' is already registered to '${existing}'.`, dev));
    this.name = 'DuplicateAliasError';
  }
}

export class InvalidAliasError extends KilnError {
  constructor(public alias: unknown) {
    const dev = [
      'Invalid plugin alias',
      '',
      `Expected a non-empty string alias, received ${describeValue(alias)}.`,
      'Anonymous functions have no name; register them with an explicit alias.',
    ];
    super(format(`Invalid plugin alias ${describeValue(alias)}.`, dev));
    this.name = 'InvalidAliasError';
  }
}

/**
 * A registered plugin threw while being invoked.
 */
export class InstantiationError extends KilnError {
  constructor(
    public path: string,
    public alias: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const dev = [
      `Error while instantiating "${path}", calling ${alias}`,
      '',
      `  ${reason}`,
      '',
      "See 'cause' for the original error.",
    ];
    super(format(`Error while instantiating "${path}", calling ${alias}.`, dev), { cause });
    this.name = 'InstantiationError';
  }
}

export class CyclicBuildError extends KilnError {
  constructor(public cycle: string[]) {
    const cycleStr = cycle.join(' → ');
    const dev = [
      'Cyclic build detected:',
      '',
      `  ${cycleStr}`,
      '',
      `Key '${cycle[cycle.length - 1]}' requires its own value to be built.`,
      '',
      'Common causes:',
      `  1. A reference such as "$${cycle[0]}" inside the value of '${cycle[0]}'`,
      `  2. Two keys referencing each other`,
      `  3. A key whose earlier build failed under failurePolicy 'poison'`,
    ];
    super(format(`Cyclic build detected: ${cycleStr}`, dev));
    this.name = 'CyclicBuildError';
  }
}

export class UnsupportedFormatError extends KilnError {
  constructor(
    public source: string,
    public extension: string
  ) {
    const dev = [
      'Unsupported document format',
      '',
      `Cannot load '${source}': extension '${extension || '(none)'}' is not supported.`,
      'Supported extensions: .json, .yaml, .yml, .toml',
    ];
    super(format(`Unsupported document format '${extension || '(none)'}'.`, dev));
    this.name = 'UnsupportedFormatError';
  }
}

export class InvalidDocumentError extends KilnError {
  constructor(
    public source: string,
    public reason: string
  ) {
    const dev = ['Invalid configuration document', '', `Document '${source}': ${reason}`];
    super(format(`Invalid configuration document: ${reason}`, dev));
    this.name = 'InvalidDocumentError';
  }
}

export class ReadOnlyExperimentError extends KilnError {
  constructor(public operation: string) {
    const dev = [
      'Cannot update experiment',
      '',
      `'${operation}' is not permitted: built objects are read-only.`,
      'Change the configuration document instead.',
    ];
    super(format(`Cannot update experiment ('${operation}').`, dev));
    this.name = 'ReadOnlyExperimentError';
  }
}

export class UnknownKeyError extends KilnError {
  constructor(
    public key: string,
    public declaredKeys: string[]
  ) {
    const dev = [
      `Key '${key}' is not declared in the configuration document.`,
      '',
      ...(declaredKeys.length > 0
        ? ['Declared keys:', ...declaredKeys.map((k) => `  - ${k}`)]
        : ['The document declares no keys.']),
    ];
    super(format(`Key '${key}' is not declared.`, dev));
    this.name = 'UnknownKeyError';
  }
}

export class AlreadyBuiltError extends KilnError {
  constructor(public key: string) {
    const dev = [
      `Key '${key}' has already been built.`,
      '',
      'Built values are final. Use getOrBuild() to read it.',
    ];
    super(format(`Key '${key}' has already been built.`, dev));
    this.name = 'AlreadyBuiltError';
  }
}

export class InvalidTypeKeyError extends KilnError {
  constructor(
    public path: string,
    public typeKey: string,
    public value: unknown
  ) {
    const dev = [
      'Invalid plugin reference',
      '',
      `"${path}.${typeKey}" must be a plugin alias string.`,
      '',
      'Received:',
      `  ${describeValue(value)}`,
    ];
    super(format(`"${path}.${typeKey}" must be a string.`, dev));
    this.name = 'InvalidTypeKeyError';
  }
}

export class InvalidExperimentOptionsError extends KilnError {
  constructor(public reason: string) {
    const dev = ['Invalid experiment options', '', `Invalid experiment options: ${reason}`];
    super(format(`Invalid experiment options: ${reason}`, dev));
    this.name = 'InvalidExperimentOptionsError';
  }
}
