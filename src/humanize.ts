import { isRecord } from "./data.js";
import { arrayBoundaries, arrayContainerPaths, splitIdentifier } from "./paths.js";
import { defaultHumanizer, type Humanizer } from "./humanizer.js";
import type { FieldDef, SpecDef } from "./types.js";

export function humanizableFields(spec: SpecDef): FieldDef[] {
  return spec.fields.filter((field) => field.humanize);
}

function humanizeValue(value: unknown, humanizer: Humanizer): unknown {
  if (typeof value === "string") return humanizer(value);
  if (Array.isArray(value)) {
    return value.map((item: unknown) => (typeof item === "string" ? humanizer(item) : item));
  }
  return value;
}

function updateAt(
  node: unknown,
  keys: readonly string[],
  boundaries: ReadonlySet<number>,
  index: number,
  humanizer: Humanizer,
): unknown {
  const key = keys[index];
  if (key === undefined || !isRecord(node) || !(key in node)) return node;

  const value = node[key];
  let next: unknown;
  if (index === keys.length - 1) {
    next = humanizeValue(value, humanizer);
  } else if (boundaries.has(index + 1)) {
    next = Array.isArray(value)
      ? value.map((element: unknown) => updateAt(element, keys, boundaries, index + 1, humanizer))
      : value;
  } else {
    next = updateAt(value, keys, boundaries, index + 1, humanizer);
  }
  return { ...node, [key]: next };
}

/**
 * Runs `humanizer` over the string values of fields marked `humanize`,
 * including those nested in array containers. Returns a new structure and
 * leaves every other value as it was. Without a humanizer the built-in
 * safe phrase tables apply.
 */
export function applyHumanizer(
  spec: SpecDef,
  data: unknown,
  humanizer: Humanizer = defaultHumanizer,
): unknown {
  const containers = arrayContainerPaths(spec.fields);
  let result = data;
  for (const field of humanizableFields(spec)) {
    const { namespace, leaf } = splitIdentifier(field.identifier);
    const boundaries = arrayBoundaries(field.identifier, containers);
    result = updateAt(result, [...namespace, leaf], boundaries, 0, humanizer);
  }
  return result;
}
