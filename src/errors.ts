export type SchemaErrorKind =
  | "InvalidField"
  | "InvalidSpec"
  | "DuplicateSpecName"
  | "UnparsableResponse";

/**
 * Raised for construction failures (fields, specs, reference registries)
 * and for model responses that cannot be parsed at all.
 *
 * Validation problems are never raised; they are collected into a
 * ValidationReport instead.
 */
export class SchemaError extends Error {
  readonly kind: SchemaErrorKind;
  readonly context: Readonly<Record<string, unknown>>;
  readonly hint?: string;

  constructor(options: {
    kind: SchemaErrorKind;
    message: string;
    context?: Record<string, unknown>;
    hint?: string;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SchemaError";
    this.kind = options.kind;
    this.context = Object.freeze({ ...options.context });
    this.hint = options.hint;
  }
}

export function isSchemaError(
  value: unknown,
  kind?: SchemaErrorKind,
): value is SchemaError {
  return value instanceof SchemaError && (kind === undefined || value.kind === kind);
}

export function invalidField(
  message: string,
  context: Record<string, unknown>,
  hint?: string,
): never {
  throw new SchemaError({ kind: "InvalidField", message, context, hint });
}

export function invalidSpec(
  message: string,
  context: Record<string, unknown>,
  hint?: string,
): never {
  throw new SchemaError({ kind: "InvalidSpec", message, context, hint });
}
