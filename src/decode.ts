import { isRecord, mapEntries, tokenText, type DataRecord } from "./data.js";
import { silentSink, type DiagnosticsSink } from "./logger.js";
import { parseJsonish, type ResponseParser } from "./parser.js";
import { splitIdentifier, stripPunctuation, wireKey } from "./paths.js";
import { buildReferenceRegistry } from "./registry.js";
import { isScalarType, type SpecDef } from "./types.js";

export interface DecodeOptions {
  readonly sink?: DiagnosticsSink;
  /** Defaults to parseJsonish. */
  readonly parser?: ResponseParser;
}

/** Wire key -> original leaf, for leaves that lost `?!*+` on the wire. */
export type IdentifierMapping = ReadonlyMap<string, string>;

function specsOf(spec: SpecDef): SpecDef[] {
  return [spec, ...buildReferenceRegistry(spec).values()];
}

export function buildIdentifierMapping(spec: SpecDef): IdentifierMapping {
  const mapping = new Map<string, string>();
  for (const owner of specsOf(spec)) {
    for (const field of owner.fields) {
      const { leaf } = splitIdentifier(field.identifier);
      const wire = stripPunctuation(leaf);
      if (wire !== leaf && !mapping.has(wire)) {
        mapping.set(wire, leaf);
      }
    }
  }
  return mapping;
}

function parseWith(text: string, options: DecodeOptions): unknown {
  const sink = options.sink ?? silentSink;
  const { value, warnings } = (options.parser ?? parseJsonish)(text);
  if (warnings.length > 0) {
    sink.log("warn", "JSON parsing warnings", { warnings });
  }
  return value;
}

/**
 * Models often answer with the list itself when the schema's only field
 * is a list. Such a bare sequence is nested under that field's key.
 */
function wrapBareSequence(value: unknown, spec: SpecDef, sink: DiagnosticsSink): unknown {
  const [only, ...others] = spec.fields;
  if (!Array.isArray(value) || !only || others.length > 0 || only.cardinality !== "many") {
    return value;
  }
  sink.log("debug", "Auto-wrapping bare array in spec field", { field: only.identifier });
  const { namespace } = splitIdentifier(only.identifier);
  let wrapped: DataRecord = { [wireKey(only.identifier)]: value };
  for (const segment of [...namespace].reverse()) {
    wrapped = { [segment]: wrapped };
  }
  return wrapped;
}

export function restoreIdentifiers(data: unknown, mapping: IdentifierMapping): unknown {
  if (mapping.size === 0) return data;
  if (Array.isArray(data)) {
    return data.map((item: unknown) => restoreIdentifiers(item, mapping));
  }
  if (isRecord(data)) {
    return mapEntries(data, (key, value) => [mapping.get(key) ?? key, restoreIdentifiers(value, mapping)]);
  }
  return data;
}

function keywordFieldNames(specs: readonly SpecDef[]): Set<string> {
  const names = new Set<string>();
  for (const owner of specs) {
    for (const field of owner.fields) {
      if (isScalarType(field.type, "keyword")) {
        names.add(splitIdentifier(field.identifier).leaf);
      }
    }
  }
  return names;
}

function toKeyword(value: unknown): unknown {
  return typeof value === "string" ? Symbol.for(value) : value;
}

export function retypeKeywords(data: unknown, names: ReadonlySet<string>): unknown {
  if (names.size === 0) return data;
  if (Array.isArray(data)) {
    return data.map((item: unknown) => retypeKeywords(item, names));
  }
  if (!isRecord(data)) return data;
  return mapEntries(data, (key, value) => {
    if (names.has(key)) {
      if (typeof value === "string") return [key, toKeyword(value)];
      if (Array.isArray(value)) return [key, value.map(toKeyword)];
    }
    return [key, retypeKeywords(value, names)];
  });
}

/** Spec name -> key namespace; the main spec's namespace sits under `null`. */
type KeyNamespaces = ReadonlyMap<string | null, string>;

function collectKeyNamespaces(spec: SpecDef, specs: readonly SpecDef[]): KeyNamespaces {
  const namespaces = new Map<string | null, string>();
  for (const ref of specs) {
    if (ref !== spec && ref.name !== undefined && ref.keyNamespace !== undefined) {
      namespaces.set(ref.name, ref.keyNamespace);
    }
  }
  if (spec.keyNamespace !== undefined) {
    namespaces.set(null, spec.keyNamespace);
  }
  return namespaces;
}

/**
 * Prefixes keys with the owning spec's key namespace. A structure whose
 * `type` names a union member takes that member's namespace; everything
 * else takes the main spec's.
 */
export function applyKeyNamespaces(data: unknown, namespaces: KeyNamespaces): unknown {
  if (namespaces.size === 0) return data;
  if (Array.isArray(data)) {
    return data.map((item: unknown) => applyKeyNamespaces(item, namespaces));
  }
  if (!isRecord(data)) return data;

  const discriminator = tokenText(data.type);
  const ns =
    (discriminator === undefined ? undefined : namespaces.get(discriminator)) ?? namespaces.get(null);
  return mapEntries(data, (key, value) => [
    ns === undefined ? key : `${ns}/${key}`,
    applyKeyNamespaces(value, namespaces),
  ]);
}

/** Parses a response without any spec-aware post-processing. */
export function parseOnly(text: string, options: DecodeOptions = {}): unknown {
  return parseWith(text, options);
}

/**
 * Parses a model response and reshapes it to match the spec: bare
 * sequences are wrapped, original identifiers restored, keyword fields
 * turned into symbols and key namespaces applied.
 */
export function decode(text: string, spec: SpecDef, options: DecodeOptions = {}): unknown {
  const sink = options.sink ?? silentSink;
  const specs = specsOf(spec);

  const parsed = parseWith(text, options);
  const wrapped = wrapBareSequence(parsed, spec, sink);

  const mapping = buildIdentifierMapping(spec);
  const keywordNames = keywordFieldNames(specs);
  const namespaces = collectKeyNamespaces(spec, specs);

  const result = applyKeyNamespaces(
    retypeKeywords(restoreIdentifiers(wrapped, mapping), keywordNames),
    namespaces,
  );

  sink.log("debug", "Decoded response with spec-aware processing", {
    keyRemaps: mapping.size,
    keywordFields: keywordNames.size,
    keyNamespaces: namespaces.size,
  });
  return result;
}
