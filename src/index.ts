export { SchemaError, isSchemaError, type SchemaErrorKind } from "./errors.js";
export {
  type Cardinality,
  type EnumValues,
  type FieldDef,
  type FieldType,
  type RefTarget,
  type ScalarTypeName,
  type SpecDef,
  type VectorBase,
  formatFieldType,
  refTargetNames,
} from "./types.js";
export { LocalDate } from "./local-date.js";
export {
  defineField,
  parseFieldType,
  isFieldTypeNotation,
  type FieldOptions,
  type FieldTypeNotation,
} from "./field.js";
export { defineSpec, isSpecDef, type SpecOptions } from "./spec.js";
export { buildReferenceRegistry, type ReferenceRegistry } from "./registry.js";
export {
  identifierToPath,
  splitIdentifier,
  stripPunctuation,
  wireKey,
  groupByNamespace,
  buildPathTree,
  arrayContainerPaths,
  arrayBoundaries,
  type SplitIdentifier,
  type NamespacedField,
  type NamespaceGroup,
  type NamespaceGroups,
  type PathTree,
} from "./paths.js";
export { countRefUsages, partitionRefsByUsage, type RefPartition } from "./refs.js";
export {
  renderSpec,
  renderBlock,
  specToPrompt,
  fieldTypeToken,
  PROMPT_PREFIX,
  type RenderOptions,
} from "./render.js";
export { parseJsonish, type ParseResult, type ResponseParser } from "./parser.js";
export {
  decode,
  parseOnly,
  buildIdentifierMapping,
  restoreIdentifiers,
  retypeKeywords,
  applyKeyNamespaces,
  type DecodeOptions,
  type IdentifierMapping,
} from "./decode.js";
export {
  validate,
  formatValidationIssues,
  type ValidationIssue,
  type ValidationReport,
  type ValidateOptions,
  type MissingRequiredField,
  type TypeMismatch,
  type InvalidEnumValue,
} from "./validate.js";
export { serialize, prepareForJson } from "./serialize.js";
export { applyHumanizer, humanizableFields } from "./humanize.js";
export {
  createHumanizer,
  defaultHumanizer,
  humanizeString,
  humanizeData,
  SAFE_PATTERNS,
  AGGRESSIVE_PATTERNS,
  DEFAULT_PATTERNS,
  type Humanizer,
  type HumanizeOptions,
} from "./humanizer.js";
export { loadSpecDocument, parseSpecDocument, specFromDocument } from "./loader.js";
export {
  silentSink,
  createFileSink,
  createConsoleSink,
  createMemorySink,
  combineSinks,
  type DiagnosticsSink,
  type LogEntry,
  type LogLevel,
  type LogThreshold,
  type MemorySink,
} from "./logger.js";
export * from "./schemas/index.js";
