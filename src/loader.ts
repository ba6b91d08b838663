import { readFileSync } from "node:fs";
import { invalidField, invalidSpec } from "./errors.js";
import { defineField, isFieldTypeNotation } from "./field.js";
import { SpecDocumentSchema, type FieldDocument, type SpecDocument } from "./schemas/spec-document.js";
import { defineSpec, type SpecOptions } from "./spec.js";
import type { FieldDef, SpecDef } from "./types.js";

function fieldFromDocument(doc: FieldDocument): FieldDef {
  if (!isFieldTypeNotation(doc.type)) {
    invalidField(
      `Field type "${doc.type}" is not a valid type`,
      { option: "type", value: doc.type, identifier: doc.identifier },
      'Use one of the scalar types or a fixed-size vector such as "int-v-4"',
    );
  }
  return defineField({
    identifier: doc.identifier,
    type: doc.type,
    cardinality: doc.cardinality,
    description: doc.description,
    optional: doc.optional,
    enum: doc.enum,
    refTargets: doc.ref_targets,
    humanize: doc.humanize,
  });
}

/** Builds a spec from its JSON document form; every construction rule applies. */
export function specFromDocument(doc: SpecDocument): SpecDef {
  const refs = (doc.refs ?? []).map(specFromDocument);
  const fields = doc.fields.map(fieldFromDocument);
  const options: SpecOptions = {
    ...(doc.refs === undefined ? {} : { refs }),
    ...(doc.key_namespace === undefined ? {} : { keyNamespace: doc.key_namespace }),
  };
  return doc.name === undefined
    ? defineSpec(options, ...fields)
    : defineSpec(doc.name, options, ...fields);
}

export function parseSpecDocument(input: unknown): SpecDef {
  const result = SpecDocumentSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    invalidSpec(
      `Invalid spec document: ${issues.join("; ")}`,
      { issues },
      "Each field needs identifier, type, cardinality and description; refs are nested spec documents",
    );
  }
  return specFromDocument(result.data);
}

export function loadSpecDocument(path: string): SpecDef {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    invalidSpec(
      `Could not read spec document ${path}: ${message}`,
      { path },
      "Check that the file exists and holds a single JSON spec document",
    );
  }
  return parseSpecDocument(raw);
}
