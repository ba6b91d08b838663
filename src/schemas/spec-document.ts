import { z } from "zod";
import { CardinalitySchema } from "./field-options.js";

export const FieldDocumentSchema = z.object({
  identifier: z.string().min(1),
  type: z.string().min(1),
  cardinality: CardinalitySchema,
  description: z.string().min(1),
  optional: z.boolean().optional(),
  enum: z.record(z.string(), z.string()).optional(),
  ref_targets: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).optional(),
  humanize: z.boolean().optional(),
});

export type FieldDocument = z.infer<typeof FieldDocumentSchema>;

export interface SpecDocument {
  name?: string;
  key_namespace?: string;
  refs?: SpecDocument[];
  fields: FieldDocument[];
}

// z.lazy needs the explicit type because refs nest specs
export const SpecDocumentSchema: z.ZodType<SpecDocument> = z.lazy(() =>
  z.object({
    name: z.string().min(1).optional(),
    key_namespace: z.string().min(1).optional(),
    refs: z.array(SpecDocumentSchema).optional(),
    fields: z.array(FieldDocumentSchema),
  }),
);
