export type SplitErrorKind = 'configuration' | 'io' | 'malformed-row' | 'schema' | 'unsafe-key'

const EXIT_CODES: Record<SplitErrorKind, number> = {
  configuration: 2,
  io: 6,
  'malformed-row': 4,
  schema: 3,
  'unsafe-key': 5,
}

/**
 * Base class for every failure that ends a split run.
 * The command reports these as `<kind> error: <message>` and exits with `exitCode`.
 */
export class SplitError extends Error {
  readonly exitCode: number

  constructor(readonly kind: SplitErrorKind, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
    this.exitCode = EXIT_CODES[kind]
  }
}

export class ConfigurationError extends SplitError {
  constructor(message: string, options?: ErrorOptions) {
    super('configuration', message, options)
  }
}

export class SchemaError extends SplitError {
  constructor(message: string, options?: ErrorOptions) {
    super('schema', message, options)
  }
}

export class ColumnNotFoundError extends SchemaError {
  constructor(readonly column: string, readonly header: readonly string[]) {
    super(`column "${column}" not found in header (${header.join(', ')})`)
  }
}

export class MalformedRowError extends SplitError {
  constructor(message: string, readonly line?: number, options?: ErrorOptions) {
    super('malformed-row', message, options)
  }
}

export class UnsafeGroupKeyError extends SplitError {
  constructor(readonly key: string) {
    super('unsafe-key', `group value "${key}" cannot be used as a file name`)
  }
}

export class GroupKeyCollisionError extends SplitError {
  constructor(readonly key: string, readonly existingKey: string, readonly path: string) {
    super('unsafe-key', `group values "${key}" and "${existingKey}" resolve to the same file: ${path}`)
  }
}

export class IoError extends SplitError {
  constructor(readonly path: string, message: string, options?: ErrorOptions) {
    super('io', `${message}: ${path}`, options)
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
