import type { FieldDef } from "./types.js";

/** Legal at the end of a source leaf name, never sent on the wire. */
const RESERVED_PUNCTUATION = /[?!*+]/g;

export interface SplitIdentifier {
  readonly namespace: readonly string[];
  readonly leaf: string;
}

/**
 * `org.division/name` -> { namespace: ["org", "division"], leaf: "name" }
 * `name`              -> { namespace: [], leaf: "name" }
 */
export function splitIdentifier(identifier: string): SplitIdentifier {
  const slash = identifier.indexOf("/");
  if (slash < 0) {
    return { namespace: [], leaf: identifier };
  }
  return {
    namespace: identifier.slice(0, slash).split("."),
    leaf: identifier.slice(slash + 1),
  };
}

export function stripPunctuation(leaf: string): string {
  return leaf.replace(RESERVED_PUNCTUATION, "");
}

/** The key a field travels under on the wire: its leaf without `?!*+`. */
export function wireKey(identifier: string): string {
  return stripPunctuation(splitIdentifier(identifier).leaf);
}

/**
 * `claims/verifiable?` -> `claims.verifiable`
 * `org.division.team/name` -> `org.division.team.name`
 */
export function identifierToPath(identifier: string): string {
  const { namespace, leaf } = splitIdentifier(identifier);
  return [...namespace, stripPunctuation(leaf)].join(".");
}

/** A field placed at its namespace, carrying its simple (leaf) name. */
export interface NamespacedField {
  readonly name: string;
  readonly field: FieldDef;
}

export interface NamespaceGroup {
  readonly path: readonly string[];
  readonly fields: readonly NamespacedField[];
}

/** Keyed by the namespace path joined with "."; the root namespace is "". */
export type NamespaceGroups = ReadonlyMap<string, NamespaceGroup>;

/**
 * Groups fields by the namespace they are declared in. Grouping is exact:
 * `a/x` lands under "a" only, never under "" or "a.b".
 */
export function groupByNamespace(fields: readonly FieldDef[]): NamespaceGroups {
  const groups = new Map<string, { path: readonly string[]; fields: NamespacedField[] }>();
  for (const field of fields) {
    const { namespace, leaf } = splitIdentifier(field.identifier);
    const key = namespace.join(".");
    let group = groups.get(key);
    if (!group) {
      group = { path: namespace, fields: [] };
      groups.set(key, group);
    }
    group.fields.push({ name: leaf, field });
  }
  return groups;
}

export interface PathTree {
  readonly fieldsHere: readonly NamespacedField[];
  readonly children: ReadonlyMap<string, PathTree>;
}

/**
 * Nests namespace groups into a tree keyed by first segment. Children keep
 * insertion order; callers that need a stable order sort at render time.
 */
export function buildPathTree(grouped: Iterable<NamespaceGroup>): PathTree {
  const fieldsHere: NamespacedField[] = [];
  const byFirst = new Map<string, NamespaceGroup[]>();

  for (const group of grouped) {
    const [first, ...rest] = group.path;
    if (first === undefined) {
      fieldsHere.push(...group.fields);
      continue;
    }
    const bucket = byFirst.get(first) ?? [];
    bucket.push({ path: rest, fields: group.fields });
    byFirst.set(first, bucket);
  }

  const children = new Map<string, PathTree>();
  for (const [segment, groups] of byFirst) {
    children.set(segment, buildPathTree(groups));
  }
  return { fieldsHere, children };
}

/** Dotted paths of the many-valued fields, the candidates for array containers. */
export function arrayContainerPaths(fields: readonly FieldDef[]): Set<string> {
  return new Set(
    fields.filter((field) => field.cardinality === "many").map((field) => identifierToPath(field.identifier)),
  );
}

/**
 * Segment counts at which a field's path crosses an array container:
 * `books.chapters.title` with containers `books` and `books.chapters`
 * gives {1, 2}. Only strict prefixes count.
 */
export function arrayBoundaries(identifier: string, containers: ReadonlySet<string>): Set<number> {
  const segments = identifierToPath(identifier).split(".");
  const boundaries = new Set<number>();
  for (let length = 1; length < segments.length; length++) {
    if (containers.has(segments.slice(0, length).join("."))) {
      boundaries.add(length);
    }
  }
  return boundaries;
}
