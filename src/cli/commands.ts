import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { decode } from "../decode.js";
import { isSchemaError } from "../errors.js";
import { applyHumanizer } from "../humanize.js";
import { createHumanizer } from "../humanizer.js";
import { loadSpecDocument } from "../loader.js";
import { combineSinks, createConsoleSink, createFileSink, type DiagnosticsSink } from "../logger.js";
import { renderSpec, specToPrompt } from "../render.js";
import { CliConfigSchema, type CliConfig } from "../schemas/cli-config.js";
import { serialize } from "../serialize.js";
import { formatValidationIssues, validate, type ValidationReport } from "../validate.js";
import type { DecodeArgs, RenderArgs, ValidateArgs } from "./parse-args.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID = 2;

const STDIN = "-";

export function loadCliConfig(
  env: Record<string, string | undefined> = process.env,
): CliConfig | null {
  const configResult = CliConfigSchema.safeParse({
    log_level: env.SCHEMACAST_LOG_LEVEL || undefined,
    log_file: env.SCHEMACAST_LOG_FILE || undefined,
  });

  if (!configResult.success) {
    console.error("Error: invalid configuration:");
    for (const issue of configResult.error.issues) {
      console.error(`  ${issue.path.join(".")}: ${issue.message}`);
    }
    return null;
  }
  return configResult.data;
}

export function createCliSink(config: CliConfig): DiagnosticsSink {
  const consoleSink = createConsoleSink(config.log_level);
  return config.log_file
    ? combineSinks(consoleSink, createFileSink(resolve(config.log_file), config.log_level))
    : consoleSink;
}

function readInput(path: string, label: string): string | null {
  if (path === STDIN) {
    return readFileSync(0, "utf-8");
  }
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    console.error(`Error: ${label} does not exist: ${fullPath}`);
    return null;
  }
  return readFileSync(fullPath, "utf-8");
}

function writeOutput(text: string, outputPath?: string): void {
  if (outputPath) {
    writeFileSync(resolve(outputPath), `${text}\n`);
    console.error(`Wrote ${resolve(outputPath)}`);
  } else {
    console.log(text);
  }
}

function reportInvalid(report: ValidationReport): number {
  console.error(`Validation failed with ${report.errors.length} error(s):`);
  for (const line of formatValidationIssues(report)) {
    console.error(`  ${line}`);
  }
  return EXIT_INVALID;
}

/**
 * Runs a command body with the CLI's shared setup. Schema errors become a
 * message (and hint) on stderr with exit status 1; anything else propagates.
 */
function withSink(
  env: Record<string, string | undefined>,
  body: (sink: DiagnosticsSink) => number,
): number {
  const config = loadCliConfig(env);
  if (!config) return EXIT_FAILURE;

  try {
    return body(createCliSink(config));
  } catch (err) {
    if (!isSchemaError(err)) throw err;
    console.error(`Error: ${err.message}`);
    if (err.hint) {
      console.error(`Hint: ${err.hint}`);
    }
    return EXIT_FAILURE;
  }
}

export function runRender(
  args: RenderArgs,
  env: Record<string, string | undefined> = process.env,
): number {
  return withSink(env, (sink) => {
    const spec = loadSpecDocument(resolve(args.specPath));
    const text = args.prompt ? specToPrompt(spec, { sink }) : renderSpec(spec, { sink });
    writeOutput(text, args.outputPath);
    return EXIT_OK;
  });
}

export function runDecode(
  args: DecodeArgs,
  env: Record<string, string | undefined> = process.env,
): number {
  return withSink(env, (sink) => {
    const spec = loadSpecDocument(resolve(args.specPath));
    const response = readInput(args.responsePath, "response file");
    if (response === null) return EXIT_FAILURE;

    const decoded = decode(response, spec, { sink });
    const data =
      args.humanize === undefined
        ? decoded
        : applyHumanizer(spec, decoded, createHumanizer({ aggressive: args.humanize === "aggressive" }));
    writeOutput(serialize(data, 2), args.outputPath);

    if (args.validate) {
      const report = validate(spec, data, { sink });
      if (!report.valid) return reportInvalid(report);
    }
    return EXIT_OK;
  });
}

export function runValidate(
  args: ValidateArgs,
  env: Record<string, string | undefined> = process.env,
): number {
  return withSink(env, (sink) => {
    const spec = loadSpecDocument(resolve(args.specPath));
    const text = readInput(args.dataPath, "data file");
    if (text === null) return EXIT_FAILURE;

    const report = validate(spec, decode(text, spec, { sink }), { sink });
    if (!report.valid) return reportInvalid(report);

    console.log("Valid.");
    return EXIT_OK;
  });
}
