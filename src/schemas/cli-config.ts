import { z } from "zod";

export const LogThresholdSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const CliConfigSchema = z.object({
  log_level: LogThresholdSchema.default("warn"),
  log_file: z.string().min(1).optional(),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;
