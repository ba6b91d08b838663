import { SchemaError, invalidSpec } from "./errors.js";
import type { SpecDef } from "./types.js";

export type ReferenceRegistry = ReadonlyMap<string, SpecDef>;

function duplicate(name: string, existing: SpecDef, conflicting: SpecDef): never {
  throw new SchemaError({
    kind: "DuplicateSpecName",
    message: `Duplicate spec name in refs: "${name}"`,
    context: { specName: name, existing, duplicate: conflicting },
    hint: "List each named spec once, in the refs of a single spec, and give different specs different names",
  });
}

/**
 * Flattens a spec's refs, and their refs in turn, into a name -> spec map
 * in discovery order.
 *
 * Each ref's subtree is collected on its own and then merged, so a name
 * clash between two sibling subtrees is caught at the merge. Any repeated
 * name is a clash, including the same definition listed twice or reached
 * through two refs.
 */
export function buildReferenceRegistry(spec: SpecDef): ReferenceRegistry {
  const registry = new Map<string, SpecDef>();

  const admit = (name: string, ref: SpecDef) => {
    const existing = registry.get(name);
    if (existing !== undefined) {
      duplicate(name, existing, ref);
    }
    registry.set(name, ref);
  };

  for (const ref of spec.refs ?? []) {
    const name = ref.name;
    if (name === undefined) {
      invalidSpec(
        "Referenced spec must have a name",
        { ref },
        'Give the spec a name, e.g. defineSpec("Address", ...)',
      );
    }
    admit(name, ref);
    for (const [nestedName, nested] of buildReferenceRegistry(ref)) {
      admit(nestedName, nested);
    }
  }

  return registry;
}
