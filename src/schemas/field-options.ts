import { z } from "zod";

export const CardinalitySchema = z.enum(["one", "many"], {
  errorMap: () => ({ message: 'Field cardinality must be "one" or "many"' }),
});

/**
 * Shape check for field options. Semantic rules (identifier syntax, type
 * notation, reserved characters, enum and ref-target consistency) are
 * enforced by defineField after this passes.
 */
export const FieldOptionsSchema = z.object({
  identifier: z.string({
    required_error: "Field identifier is required",
    invalid_type_error: "Field identifier must be a string",
  }),
  type: z.string({
    required_error: "Field type is required",
    invalid_type_error: "Field type must be a type name string",
  }),
  cardinality: CardinalitySchema,
  description: z.string({
    required_error: "Field description is required",
    invalid_type_error: "Field description must be a string",
  }),
  optional: z.boolean({ invalid_type_error: "Field optional must be a boolean" }).default(false),
  enum: z.unknown().optional(),
  refTargets: z.unknown().optional(),
  humanize: z.boolean({ invalid_type_error: "Field humanize must be a boolean" }).default(false),
});

export type ParsedFieldOptions = z.infer<typeof FieldOptionsSchema>;
