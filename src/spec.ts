import { invalidSpec } from "./errors.js";
import { SpecOptionsSchema } from "./schemas/spec-options.js";
import { refTargetNames, type FieldDef, type SpecDef } from "./types.js";

export interface SpecOptions {
  /** Specs that ref fields may target. Each must be named. */
  readonly refs?: readonly SpecDef[];
  /** Prefix applied to every decoded key, e.g. "page.node" turns `type` into `page.node/type`. */
  readonly keyNamespace?: string;
}

type SpecArg = string | SpecOptions | FieldDef;

function isFieldDef(arg: SpecArg): arg is FieldDef {
  return typeof arg === "object" && "identifier" in arg;
}

export function isSpecDef(value: unknown): value is SpecDef {
  return (
    typeof value === "object" &&
    value !== null &&
    "fields" in value &&
    Array.isArray(value.fields)
  );
}

function splitArgs(args: readonly SpecArg[]): {
  name?: string;
  options?: SpecOptions;
  fields: FieldDef[];
} {
  let index = 0;
  let name: string | undefined;
  let options: SpecOptions | undefined;

  const first = args[0];
  if (typeof first === "string") {
    name = first;
    index++;
  }
  const next = args[index];
  if (next !== undefined && typeof next === "object" && !isFieldDef(next)) {
    options = next;
    index++;
  }

  const fields: FieldDef[] = [];
  for (const arg of args.slice(index)) {
    if (typeof arg === "string" || !isFieldDef(arg)) {
      invalidSpec(
        "Spec arguments after the name and options must be fields created with defineField",
        { value: arg },
        'Pass the name first, then the options object, then fields: defineSpec("Person", { refs }, field)',
      );
    }
    fields.push(arg);
  }
  return { name, options, fields };
}

function checkRefs(raw: readonly unknown[]): SpecDef[] {
  const refs: SpecDef[] = [];
  for (const ref of raw) {
    if (!isSpecDef(ref)) {
      invalidSpec(
        "Each ref must be a spec created with defineSpec",
        { ref },
        'Build the ref with defineSpec("Name", ...fields) before listing it',
      );
    }
    if (ref.name === undefined || ref.name.length === 0) {
      invalidSpec(
        "Referenced specs must be named",
        { ref },
        'Give the spec a name, e.g. defineSpec("Address", ...)',
      );
    }
    refs.push(ref);
  }
  return refs;
}

/**
 * Creates a spec from field definitions.
 *
 * @example
 * defineSpec(field)                               // anonymous
 * defineSpec("Person", field)                     // named
 * defineSpec("Person", { refs: [address] }, home) // named, with refs
 */
export function defineSpec(...fields: FieldDef[]): SpecDef;
export function defineSpec(name: string, ...fields: FieldDef[]): SpecDef;
export function defineSpec(options: SpecOptions, ...fields: FieldDef[]): SpecDef;
export function defineSpec(name: string, options: SpecOptions, ...fields: FieldDef[]): SpecDef;
export function defineSpec(...args: SpecArg[]): SpecDef {
  const { name, options, fields } = splitArgs(args);

  if (name !== undefined && name.length === 0) {
    invalidSpec(
      "Spec name must not be empty",
      { name },
      "Give the spec a name, or leave the name out for an anonymous spec",
    );
  }

  const parsed = SpecOptionsSchema.safeParse(options ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    invalidSpec(
      issue?.message ?? "Invalid spec options",
      { option: issue?.path.join(".") ?? "", options },
      "Spec options take only refs (an array of specs) and keyNamespace (a non-empty string)",
    );
  }
  const { keyNamespace } = parsed.data;
  const refs = parsed.data.refs === undefined ? undefined : checkRefs(parsed.data.refs);

  // Refs are not flattened: only names declared directly in `refs` are valid targets.
  const available = new Set((refs ?? []).map((ref) => ref.name));
  for (const field of fields) {
    if (!field.refTargets) continue;
    const targets = refTargetNames(field.refTargets);
    for (const target of targets) {
      if (!available.has(target)) {
        invalidSpec(
          `Field "${field.identifier}" references target "${target}" but no ref with that name exists`,
          { field: field.identifier, target, allTargets: targets, availableRefs: [...available] },
          "Register the referenced spec with defineSpec({ refs: [referencedSpec] }, ...)",
        );
      }
    }
  }

  return Object.freeze({
    fields: Object.freeze([...fields]),
    ...(name === undefined ? {} : { name }),
    ...(refs === undefined ? {} : { refs: Object.freeze(refs) }),
    ...(keyNamespace === undefined ? {} : { keyNamespace }),
  });
}
