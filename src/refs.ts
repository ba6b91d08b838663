import type { ReferenceRegistry } from "./registry.js";
import type { SpecDef } from "./types.js";
import { refTargetNames } from "./types.js";

export interface RefPartition {
  /** Used two or more times: rendered once as a named block. */
  readonly hoisted: readonly SpecDef[];
  /** Used exactly once: rendered once as an anonymous block. */
  readonly inlined: readonly SpecDef[];
  /** Never targeted: left out of the rendered schema. */
  readonly unused: readonly string[];
}

/**
 * Counts ref-field targets across the spec and every registered spec. A
 * union contributes one count per member, not one per field.
 */
export function countRefUsages(
  spec: SpecDef,
  registry: ReferenceRegistry,
): ReadonlyMap<string, number> {
  const counts = new Map<string, number>();
  for (const owner of [spec, ...registry.values()]) {
    for (const field of owner.fields) {
      if (!field.refTargets) continue;
      for (const name of refTargetNames(field.refTargets)) {
        counts.set(name, (counts.get(name) ?? 0) + 1);
      }
    }
  }
  return counts;
}

export function partitionRefsByUsage(
  spec: SpecDef,
  registry: ReferenceRegistry,
): RefPartition {
  const counts = countRefUsages(spec, registry);
  const hoisted: SpecDef[] = [];
  const inlined: SpecDef[] = [];
  const unused: string[] = [];

  for (const [name, ref] of registry) {
    const count = counts.get(name) ?? 0;
    if (count >= 2) {
      hoisted.push(ref);
    } else if (count === 1) {
      inlined.push(ref);
    } else {
      unused.push(name);
    }
  }
  return { hoisted, inlined, unused };
}
