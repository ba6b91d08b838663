import { z } from "zod";

export const SpecOptionsSchema = z
  .object({
    refs: z.array(z.unknown(), { invalid_type_error: "Spec refs must be an array of specs" }).optional(),
    keyNamespace: z
      .string({ invalid_type_error: 'Spec keyNamespace must be a string (e.g. "page.node")' })
      .min(1, "Spec keyNamespace must not be empty")
      .optional(),
  })
  .strict();

export type ParsedSpecOptions = z.infer<typeof SpecOptionsSchema>;
