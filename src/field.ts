import { invalidField } from "./errors.js";
import { FieldOptionsSchema } from "./schemas/field-options.js";
import type {
  Cardinality,
  EnumValues,
  FieldDef,
  FieldType,
  RefTarget,
  ScalarTypeName,
  VectorBase,
} from "./types.js";

export type FieldTypeNotation = ScalarTypeName | `${VectorBase}-v-${number}`;

export interface FieldOptions {
  /** `leaf` or `seg1.seg2/leaf`; the leaf may end in `?`, `!`, `*` or `+`. */
  readonly identifier: string;
  readonly type: FieldTypeNotation;
  readonly cardinality: Cardinality;
  /** Shown to the model; must not contain `[ ] ; = |`. */
  readonly description: string;
  /** Defaults to false. */
  readonly optional?: boolean;
  /** Allowed value -> description. Only for string and keyword fields. */
  readonly enum?: EnumValues;
  /** Required for `ref` fields: one spec name, or several for a union. */
  readonly refTargets?: string | readonly string[];
  /** Marks the field for applyHumanizer. Defaults to false. */
  readonly humanize?: boolean;
}

const SCALAR_TYPES: readonly ScalarTypeName[] = [
  "string",
  "int",
  "float",
  "bool",
  "date",
  "datetime",
  "keyword",
  "ref",
];

function isScalarTypeName(notation: string): notation is ScalarTypeName {
  return SCALAR_TYPES.some((name) => name === notation);
}

const VECTOR_TYPE = /^(int|string|double)-v-(\d+)$/;
const IDENTIFIER = /^(?:([^\s/]+)\/)?([^\s/]+)$/;

export const DESCRIPTION_RESERVED_CHARS: readonly string[] = ["[", "]", ";", "=", "|"];
export const ENUM_VALUE_RESERVED_CHARS: readonly string[] = [",", ":", "[", "]", ";", "=", "|"];

function reservedIn(text: string, reserved: readonly string[]): string[] {
  return reserved.filter((c) => text.includes(c));
}

/**
 * Parses type notation (`string`, `int-v-4`, ...) into a FieldType.
 * Returns null for anything that is not a known scalar or a well-formed
 * vector type with a positive size.
 */
export function parseFieldType(notation: string): FieldType | null {
  if (isScalarTypeName(notation)) {
    return { kind: "scalar", name: notation };
  }
  const match = VECTOR_TYPE.exec(notation);
  if (!match) return null;
  const base = match[1];
  const size = Number(match[2]);
  if ((base !== "int" && base !== "string" && base !== "double") || !(size > 0)) {
    return null;
  }
  return { kind: "vector", base, size };
}

export function isFieldTypeNotation(notation: string): notation is FieldTypeNotation {
  return parseFieldType(notation) !== null;
}

function checkIdentifier(identifier: string): void {
  const match = IDENTIFIER.exec(identifier);
  if (!match) {
    invalidField(
      `Field identifier "${identifier}" is not a valid identifier`,
      { option: "identifier", value: identifier },
      'Use "name" or a namespaced form such as "address/city" or "org.division/name"',
    );
  }
  const namespace = match[1];
  const leaf = match[2] ?? "";
  if (leaf.includes(".")) {
    const segments = [...(namespace?.split(".") ?? []), ...leaf.split(".")];
    const last = segments.pop() ?? "";
    invalidField(
      "Field identifier contains a dot in its leaf name. Dots only separate namespace segments.",
      { option: "identifier", value: identifier },
      `Change "${identifier}" to "${segments.join(".")}/${last}"`,
    );
  }
  if (namespace !== undefined && namespace.split(".").some((segment) => segment === "")) {
    invalidField(
      `Field identifier "${identifier}" has an empty namespace segment`,
      { option: "identifier", value: identifier },
      'Separate namespace segments with single dots, e.g. "org.team/name"',
    );
  }
}

function checkDescription(description: string, option: string): void {
  const invalid = reservedIn(description, DESCRIPTION_RESERVED_CHARS);
  if (invalid.length > 0) {
    invalidField(
      "Description contains reserved characters",
      { option, description, invalidChars: invalid, reservedChars: DESCRIPTION_RESERVED_CHARS },
      `Remove ${invalid.map((c) => `"${c}"`).join(" ")} from the description`,
    );
  }
}

function toRefTarget(raw: unknown): RefTarget {
  if (typeof raw === "string" && raw.length > 0) {
    return { kind: "single", name: raw };
  }
  if (
    Array.isArray(raw) &&
    raw.length > 0 &&
    raw.every((name: unknown): name is string => typeof name === "string" && name.length > 0)
  ) {
    return { kind: "union", names: Object.freeze([...raw]) };
  }
  return invalidField(
    "Field refTargets must be a spec name or a non-empty array of spec names (for unions)",
    { option: "refTargets", value: raw },
    'Use refTargets: "Address" for one spec or refTargets: ["Cat", "Dog"] for a union',
  );
}

function toEnumValues(raw: unknown): EnumValues {
  if (Array.isArray(raw)) {
    invalidField(
      "Field enum must map each value to its description, not be a list. Every enum value requires a description.",
      { option: "enum", value: raw },
      'Use { "value1": "Description of value1", "value2": "Description of value2" }',
    );
  }
  if (typeof raw !== "object" || raw === null) {
    invalidField(
      "Field enum must be an object of value -> description pairs",
      { option: "enum", value: raw },
      'Use { "value1": "Description of value1", "value2": "Description of value2" }',
    );
  }
  const entries: [string, unknown][] = Object.entries(raw);
  if (entries.length === 0) {
    invalidField(
      "Field enum must list at least one value",
      { option: "enum", value: raw },
      "Add at least one value with its description, or drop the enum option",
    );
  }
  const values: Record<string, string> = {};
  for (const [value, description] of entries) {
    const invalid = reservedIn(value, ENUM_VALUE_RESERVED_CHARS);
    if (invalid.length > 0) {
      invalidField(
        "Enum value contains reserved characters",
        { option: "enum", value, invalidChars: invalid, reservedChars: ENUM_VALUE_RESERVED_CHARS },
        `Remove ${invalid.map((c) => `"${c}"`).join(" ")} from the enum value`,
      );
    }
    if (typeof description !== "string" || description.length === 0) {
      invalidField(
        "Every enum value must have a description",
        { option: "enum", value, description },
        `Map "${value}" to a non-empty description string`,
      );
    }
    checkDescription(description, "enum");
    values[value] = description;
  }
  return Object.freeze(values);
}

const OPTION_HINTS: Readonly<Record<string, string>> = {
  identifier: 'Pass the identifier as a string, e.g. "name" or "address/city"',
  type: 'Pass a type name such as "string", "int" or "int-v-3"',
  cardinality: 'Pass "one" for a single value or "many" for a list',
  description: "Pass the description as a string",
  optional: "Pass true or false",
  humanize: "Pass true or false",
};

function valueAt(root: unknown, path: readonly (string | number)[]): unknown {
  let current = root;
  for (const key of path) {
    if (typeof current !== "object" || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * Defines one schema slot. Options are checked eagerly and the first
 * violation is raised as an InvalidField SchemaError.
 */
export function defineField(options: FieldOptions): FieldDef {
  const parsed = FieldOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const option = issue?.path.join(".") ?? "";
    invalidField(
      issue?.message ?? "Invalid field options",
      {
        option,
        value: valueAt(options, issue?.path ?? []),
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      },
      OPTION_HINTS[option] ?? "Check the options passed to defineField",
    );
  }
  const opts = parsed.data;

  checkIdentifier(opts.identifier);

  const type = parseFieldType(opts.type);
  if (!type) {
    invalidField(
      `Field type "${opts.type}" is not a valid type`,
      { option: "type", value: opts.type, validTypes: SCALAR_TYPES },
      'Use one of the scalar types or a fixed-size vector such as "int-v-4", "string-v-2" or "double-v-3"',
    );
  }

  if (opts.description.length === 0) {
    invalidField(
      "Field description is required",
      { option: "description", value: opts.description },
      "Describe what the field holds; the text is shown to the model",
    );
  }
  checkDescription(opts.description, "description");

  const isRef = type.kind === "scalar" && type.name === "ref";
  if (isRef && opts.refTargets === undefined) {
    invalidField(
      'Field refTargets is required when type is "ref"',
      { option: "refTargets", identifier: opts.identifier, value: opts.refTargets },
      'Name the referenced spec, e.g. refTargets: "Address"',
    );
  }
  if (!isRef && opts.refTargets !== undefined) {
    invalidField(
      'Field refTargets can only be used with type "ref"',
      { option: "refTargets", type: opts.type, value: opts.refTargets },
      'Set type: "ref", or drop the refTargets option',
    );
  }
  const refTargets = opts.refTargets === undefined ? undefined : toRefTarget(opts.refTargets);

  let enumValues: EnumValues | undefined;
  if (opts.enum !== undefined) {
    if (type.kind !== "scalar" || (type.name !== "string" && type.name !== "keyword")) {
      invalidField(
        'Field enum can only be used with type "string" or "keyword"',
        { option: "enum", type: opts.type, value: opts.enum },
        'Set type: "keyword" (or "string"), or drop the enum option',
      );
    }
    enumValues = toEnumValues(opts.enum);
  }

  return Object.freeze({
    identifier: opts.identifier,
    type: Object.freeze(type),
    cardinality: opts.cardinality,
    description: opts.description,
    optional: opts.optional,
    humanize: opts.humanize,
    ...(enumValues === undefined ? {} : { enumValues }),
    ...(refTargets === undefined ? {} : { refTargets: Object.freeze(refTargets) }),
  });
}
