export type ScalarTypeName =
  | "string"
  | "int"
  | "float"
  | "bool"
  | "date"
  | "datetime"
  | "keyword"
  | "ref";

export type VectorBase = "int" | "string" | "double";

export type FieldType =
  | { readonly kind: "scalar"; readonly name: ScalarTypeName }
  | { readonly kind: "vector"; readonly base: VectorBase; readonly size: number };

export type Cardinality = "one" | "many";

export type RefTarget =
  | { readonly kind: "single"; readonly name: string }
  | { readonly kind: "union"; readonly names: readonly string[] };

/**
 * Allowed enum values, each with its description. Integer-like keys such as
 * "10" enumerate first, in numeric order, before the rest in insertion order.
 */
export type EnumValues = Readonly<Record<string, string>>;

export interface FieldDef {
  /** `leaf` or `seg1.seg2/leaf`. */
  readonly identifier: string;
  readonly type: FieldType;
  readonly cardinality: Cardinality;
  readonly description: string;
  readonly optional: boolean;
  readonly enumValues?: EnumValues;
  readonly refTargets?: RefTarget;
  readonly humanize: boolean;
}

export interface SpecDef {
  readonly name?: string;
  readonly fields: readonly FieldDef[];
  readonly refs?: readonly SpecDef[];
  readonly keyNamespace?: string;
}

export function refTargetNames(target: RefTarget): readonly string[] {
  return target.kind === "single" ? [target.name] : target.names;
}

export function isScalarType(type: FieldType, name: ScalarTypeName): boolean {
  return type.kind === "scalar" && type.name === name;
}

/** Renders a field type back into its notation, e.g. `int-v-3`. */
export function formatFieldType(type: FieldType): string {
  return type.kind === "scalar" ? type.name : `${type.base}-v-${type.size}`;
}
