import { describeKind, isRecord, tokenText } from "./data.js";
import { LocalDate } from "./local-date.js";
import { silentSink, type DiagnosticsSink } from "./logger.js";
import { arrayBoundaries, arrayContainerPaths, identifierToPath, splitIdentifier } from "./paths.js";
import {
  formatFieldType,
  type Cardinality,
  type FieldDef,
  type FieldType,
  type ScalarTypeName,
  type SpecDef,
  type VectorBase,
} from "./types.js";

interface IssueBase {
  readonly identifier: string;
  /** Dotted wire path, e.g. `books.title`. */
  readonly path: string;
}

export interface MissingRequiredField extends IssueBase {
  readonly kind: "MissingRequiredField";
  /** For fields inside array containers: the element locations lacking a value. */
  readonly missingAt?: readonly string[];
}

export interface TypeMismatch extends IssueBase {
  readonly kind: "TypeMismatch";
  readonly expected: string;
  readonly cardinality: Cardinality;
  readonly actualValue: unknown;
  readonly actualKind: string;
  /** Element location of the offending value, for fields inside array containers. */
  readonly at?: string;
}

export interface InvalidEnumValue extends IssueBase {
  readonly kind: "InvalidEnumValue";
  readonly value: unknown;
  readonly allowed: readonly string[];
}

export type ValidationIssue = MissingRequiredField | TypeMismatch | InvalidEnumValue;

export interface ValidationReport {
  readonly valid: boolean;
  readonly errors: readonly ValidationIssue[];
}

export interface ValidateOptions {
  readonly sink?: DiagnosticsSink;
}

interface Extracted {
  readonly location: string;
  readonly value: unknown;
}

function isMissing(value: unknown): boolean {
  return value === null || value === undefined;
}

function checkScalar(name: ScalarTypeName, value: unknown): boolean {
  switch (name) {
    case "string":
      return typeof value === "string";
    case "int":
      return Number.isInteger(value);
    case "float":
      return typeof value === "number" && Number.isFinite(value);
    case "bool":
      return typeof value === "boolean";
    case "keyword":
      return typeof value === "symbol";
    case "date":
      return value instanceof LocalDate;
    case "datetime":
      return value instanceof Date && !Number.isNaN(value.getTime());
    case "ref":
      return isRecord(value);
  }
}

function checkVectorElement(base: VectorBase, value: unknown): boolean {
  switch (base) {
    case "int":
      return Number.isInteger(value);
    case "string":
      return typeof value === "string";
    case "double":
      return typeof value === "number" && Number.isFinite(value);
  }
}

function checkElement(type: FieldType, value: unknown): boolean {
  if (type.kind === "vector") {
    return (
      Array.isArray(value) &&
      value.length === type.size &&
      value.every((element: unknown) => checkVectorElement(type.base, element))
    );
  }
  return checkScalar(type.name, value);
}

/**
 * A fixed-size vector is one array whatever the cardinality. A many-valued
 * container with child fields only has to be an array; the children check
 * their own shape.
 */
function checkValue(field: FieldDef, value: unknown, hasChildren: boolean): boolean {
  if (field.type.kind === "vector" || field.cardinality === "one") {
    return checkElement(field.type, value);
  }
  if (!Array.isArray(value)) return false;
  return hasChildren || value.every((element: unknown) => checkElement(field.type, element));
}

function isAllowed(field: FieldDef, value: unknown): boolean {
  const text = tokenText(value);
  return field.enumValues !== undefined && text !== undefined && Object.hasOwn(field.enumValues, text);
}

function firstInvalidEnumValue(field: FieldDef, value: unknown): unknown {
  if (field.cardinality === "many") {
    if (!Array.isArray(value)) return value;
    return value.find((candidate: unknown) => !isAllowed(field, candidate));
  }
  return isAllowed(field, value) ? undefined : value;
}

/**
 * Walks `keys`, fanning out over every element at each array boundary. An
 * optional container that is absent or null has no elements to check.
 */
function extract(
  node: unknown,
  keys: readonly string[],
  boundaries: ReadonlySet<number>,
  optionalContainers: ReadonlySet<string>,
  start: number,
  location: string,
): Extracted[] {
  let current = node;
  let at = location;
  for (let i = start; i < keys.length; i++) {
    const key = keys[i] ?? "";
    current = isRecord(current) ? current[key] : undefined;
    at = at === "" ? key : `${at}.${key}`;
    if (boundaries.has(i + 1) && i + 1 < keys.length) {
      if (!Array.isArray(current)) {
        const optional = optionalContainers.has(keys.slice(0, i + 1).join("."));
        return optional && isMissing(current) ? [] : [{ location: at, value: undefined }];
      }
      const container = at;
      return current.flatMap((element: unknown, index: number) =>
        extract(element, keys, boundaries, optionalContainers, i + 1, `${container}[${index}]`),
      );
    }
  }
  return [{ location: at, value: current }];
}

function validateField(
  field: FieldDef,
  data: unknown,
  containers: ReadonlySet<string>,
  optionalContainers: ReadonlySet<string>,
  allPaths: readonly string[],
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const { namespace, leaf } = splitIdentifier(field.identifier);
  const path = identifierToPath(field.identifier);
  const keys = [...namespace, leaf];
  const base = { identifier: field.identifier, path };

  const boundaries = arrayBoundaries(field.identifier, containers);
  const inArray = boundaries.size > 0;
  const hasChildren =
    field.cardinality === "many" && allPaths.some((other) => other.startsWith(`${path}.`));

  const extracted = extract(data, keys, boundaries, optionalContainers, 0, "");
  const absent = extracted.filter((entry) => isMissing(entry.value));
  const present = extracted.filter((entry) => !isMissing(entry.value));
  const missing = present.length === 0 && (absent.length > 0 || !inArray);

  if (!field.optional && absent.length > 0) {
    issues.push(
      inArray
        ? { kind: "MissingRequiredField", ...base, missingAt: absent.map((entry) => entry.location) }
        : { kind: "MissingRequiredField", ...base },
    );
  }
  if (missing) return issues;

  const mismatch = present.find((entry) => !checkValue(field, entry.value, hasChildren));
  if (mismatch) {
    issues.push({
      kind: "TypeMismatch",
      ...base,
      expected: formatFieldType(field.type),
      cardinality: field.cardinality,
      actualValue: mismatch.value,
      actualKind: describeKind(mismatch.value),
      ...(inArray ? { at: mismatch.location } : {}),
    });
  }

  if (field.enumValues) {
    for (const entry of present) {
      const invalid = firstInvalidEnumValue(field, entry.value);
      if (invalid !== undefined) {
        issues.push({
          kind: "InvalidEnumValue",
          ...base,
          value: invalid,
          allowed: Object.keys(field.enumValues).sort(),
        });
        break;
      }
    }
  }

  return issues;
}

/**
 * Checks decoded data against a spec and reports every violation found.
 * Each field yields at most one issue per check (presence, type, enum).
 */
export function validate(
  spec: SpecDef,
  data: unknown,
  options: ValidateOptions = {},
): ValidationReport {
  const sink = options.sink ?? silentSink;
  const allPaths = spec.fields.map((field) => identifierToPath(field.identifier));
  const containers = arrayContainerPaths(spec.fields);
  const optionalContainers = arrayContainerPaths(spec.fields.filter((field) => field.optional));

  const errors = spec.fields.flatMap((field) =>
    validateField(field, data, containers, optionalContainers, allPaths),
  );

  if (errors.length === 0) {
    sink.log("debug", "Spec validation passed", { fields: spec.fields.length });
  } else {
    sink.log("warn", "Spec validation failed", {
      fields: spec.fields.length,
      errors: errors.length,
    });
  }
  return { valid: errors.length === 0, errors };
}

function formatIssue(issue: ValidationIssue): string {
  switch (issue.kind) {
    case "MissingRequiredField":
      return issue.missingAt
        ? `${issue.path}: missing required field at ${issue.missingAt.join(", ")}`
        : `${issue.path}: missing required field`;
    case "TypeMismatch": {
      const expected = issue.cardinality === "many" ? `many ${issue.expected}` : issue.expected;
      const where = issue.at === undefined ? "" : ` at ${issue.at}`;
      return `${issue.path}: expected ${expected}, got ${issue.actualKind}${where}`;
    }
    case "InvalidEnumValue":
      return `${issue.path}: "${tokenText(issue.value) ?? describeKind(issue.value)}" is not one of ${issue.allowed.join(", ")}`;
  }
}

export function formatValidationIssues(report: ValidationReport): string[] {
  return report.errors.map(formatIssue);
}
