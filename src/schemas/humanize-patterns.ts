import { z } from "zod";

/** Phrase -> replacement. An empty replacement removes the phrase. */
export const PhraseTableSchema = z.record(
  z.string().min(1, "Humanizer patterns must not be empty strings"),
  z.string(),
);

export const HumanizePatternFileSchema = z.object({
  safe: z.record(PhraseTableSchema),
  aggressive: z.record(PhraseTableSchema),
});

export type PhraseTable = z.infer<typeof PhraseTableSchema>;
export type HumanizePatternFile = z.infer<typeof HumanizePatternFileSchema>;
