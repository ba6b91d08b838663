import { silentSink, type DiagnosticsSink } from "./logger.js";
import { buildPathTree, groupByNamespace, stripPunctuation, type NamespacedField, type PathTree } from "./paths.js";
import { partitionRefsByUsage } from "./refs.js";
import { buildReferenceRegistry } from "./registry.js";
import { refTargetNames, type FieldDef, type ScalarTypeName, type SpecDef, type VectorBase } from "./types.js";

export interface RenderOptions {
  /** Receives the unused-ref warnings. */
  readonly sink?: DiagnosticsSink;
}

export const PROMPT_PREFIX = "Answer in JSON using this schema:\n";

const INDENT = "  ";

// date, datetime and keyword have no wire type of their own
const SCALAR_TOKENS: Record<Exclude<ScalarTypeName, "ref">, string> = {
  string: "string",
  int: "int",
  float: "float",
  bool: "bool",
  date: "string",
  datetime: "string",
  keyword: "string",
};

const VECTOR_TOKENS: Record<VectorBase, string> = {
  int: "int",
  string: "string",
  double: "float",
};

function baseToken(field: FieldDef): string {
  const { type } = field;
  if (field.enumValues) {
    return Object.keys(field.enumValues)
      .sort()
      .map((value) => `"${value}"`)
      .join(" or ");
  }
  if (type.kind === "vector") {
    return `${VECTOR_TOKENS[type.base]}[${type.size}]`;
  }
  const scalar = type.name;
  if (scalar === "ref") {
    return field.refTargets ? refTargetNames(field.refTargets).join(" | ") : "object";
  }
  return SCALAR_TOKENS[scalar];
}

/**
 * The type token written after a field's wire key.
 *
 * Fixed-size vectors never take the `[]` suffix, whatever their
 * cardinality: the size already makes them arrays.
 */
export function fieldTypeToken(field: FieldDef): string {
  let token = baseToken(field);
  if (field.cardinality === "many" && field.type.kind !== "vector") {
    token += "[]";
  }
  if (field.optional) {
    token += " or null";
  }
  return token;
}

function describeField(field: FieldDef): string {
  const { type } = field;
  let hint = "";
  if (type.kind === "vector") {
    hint = ` (exactly ${type.size} elements)`;
  } else if (type.name === "date") {
    hint = " (ISO date YYYY-MM-DD)";
  } else if (type.name === "datetime") {
    hint = " (ISO datetime)";
  }
  return `${field.description}${hint} ${field.optional ? "(optional)" : "(required)"}`;
}

function commentLines(field: FieldDef, indent: string): string[] {
  const lines = [`${indent}// ${describeField(field)}`];
  if (field.enumValues) {
    const sorted = Object.entries(field.enumValues).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [value, description] of sorted) {
      lines.push(`${indent}//   - "${value}": ${description}`);
    }
  }
  return lines;
}

function renderField({ name, field }: NamespacedField, indent: string): string[] {
  return [...commentLines(field, indent), `${indent}${stripPunctuation(name)}: ${fieldTypeToken(field)},`];
}

/** A many-valued field whose name is also the namespace of sibling fields. */
function findArrayContainer(tree: PathTree, segment: string): NamespacedField | undefined {
  return tree.fieldsHere.find((nf) => nf.field.cardinality === "many" && nf.name === segment);
}

function renderTree(tree: PathTree, indent: string): string[] {
  const lines: string[] = [];

  for (const nf of tree.fieldsHere) {
    if (nf.field.cardinality === "many" && tree.children.has(nf.name)) continue;
    lines.push(...renderField(nf, indent));
  }

  const segments = [...tree.children.keys()].sort();
  for (const segment of segments) {
    const child = tree.children.get(segment);
    if (!child) continue;
    const container = findArrayContainer(tree, segment);
    if (container) {
      lines.push(
        ...commentLines(container.field, indent),
        `${indent}${stripPunctuation(segment)}: [`,
        `${indent}${INDENT}{`,
        ...renderTree(child, indent + INDENT + INDENT),
        `${indent}${INDENT}}`,
        `${indent}]${container.field.optional ? " or null" : ""},`,
      );
    } else {
      lines.push(`${indent}${segment}: {`, ...renderTree(child, indent + INDENT), `${indent}},`);
    }
  }

  return lines;
}

/** Renders one spec as a `Name { ... }` block, or `{ ... }` without a name. */
export function renderBlock(spec: SpecDef, name?: string): string {
  const tree = buildPathTree(groupByNamespace(spec.fields).values());
  const body = renderTree(tree, INDENT).join("\n");
  return `${name === undefined ? "" : `${name} `}{\n${body}\n}`;
}

/**
 * Renders a spec into the schema block embedded in prompts: shared refs
 * first as named blocks, then single-use refs as anonymous blocks, then
 * the spec itself, separated by blank lines.
 */
export function renderSpec(spec: SpecDef, options: RenderOptions = {}): string {
  const sink = options.sink ?? silentSink;
  const registry = buildReferenceRegistry(spec);
  const { hoisted, inlined, unused } = partitionRefsByUsage(spec, registry);

  for (const name of unused) {
    sink.log("warn", `Unused ref in spec: ${name}`, { spec: spec.name ?? null, ref: name });
  }

  const blocks = [
    ...hoisted.map((ref) => renderBlock(ref, ref.name)),
    ...inlined.map((ref) => renderBlock(ref)),
    renderBlock(spec, spec.name),
  ];
  return blocks.join("\n\n");
}

export function specToPrompt(spec: SpecDef, options: RenderOptions = {}): string {
  return PROMPT_PREFIX + renderSpec(spec, options);
}
