export { CardinalitySchema, FieldOptionsSchema, type ParsedFieldOptions } from "./field-options.js";
export { SpecOptionsSchema, type ParsedSpecOptions } from "./spec-options.js";
export {
  FieldDocumentSchema,
  type FieldDocument,
  SpecDocumentSchema,
  type SpecDocument,
} from "./spec-document.js";
export { LogThresholdSchema, CliConfigSchema, type CliConfig } from "./cli-config.js";
export {
  PhraseTableSchema,
  HumanizePatternFileSchema,
  type PhraseTable,
  type HumanizePatternFile,
} from "./humanize-patterns.js";
