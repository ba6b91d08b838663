export const MAIN_USAGE = `schemacast — render output schemas for prompts and decode model responses

Usage:
  schemacast <command> [options]

Commands:
  render <spec_file>                   Print the schema block for a spec
  decode <spec_file> <response_file>   Decode a model response against a spec
  validate <spec_file> <data_file>     Decode a JSON document and report schema violations

Options:
  --help, -h               Show this help message

A file argument of "-" reads from stdin.

Environment:
  SCHEMACAST_LOG_LEVEL     debug, info, warn, error or silent (default: warn)
  SCHEMACAST_LOG_FILE      Also write diagnostics to this file

Run "schemacast <command> --help" for command-specific options.`;

export const RENDER_USAGE = `schemacast render — print the schema block for a spec

Usage:
  schemacast render <spec_file> [options]

Arguments:
  <spec_file>              Spec document (JSON)

Options:
  --prompt                 Prefix the block with the answer instruction
  --output <file>          Write to a file instead of stdout
  --help, -h               Show this help message`;

export const DECODE_USAGE = `schemacast decode — decode a model response against a spec

Usage:
  schemacast decode <spec_file> <response_file> [options]

Arguments:
  <spec_file>              Spec document (JSON)
  <response_file>          Raw model response text

Options:
  --validate               Also validate the decoded data (exit 2 when invalid)
  --humanize               Strip model-style phrasing from fields marked humanize
  --aggressive             Like --humanize, also rewriting hedges, buzzwords and cliches
  --output <file>          Write the decoded JSON to a file instead of stdout
  --help, -h               Show this help message`;

export const VALIDATE_USAGE = `schemacast validate — report schema violations

Usage:
  schemacast validate <spec_file> <data_file>

Arguments:
  <spec_file>              Spec document (JSON)
  <data_file>              JSON data to check (decoded against the spec first)

Options:
  --help, -h               Show this help message

Exits with status 2 when the data is invalid.`;

export function usageFor(topic?: "render" | "decode" | "validate"): string {
  switch (topic) {
    case "render":
      return RENDER_USAGE;
    case "decode":
      return DECODE_USAGE;
    case "validate":
      return VALIDATE_USAGE;
    default:
      return MAIN_USAGE;
  }
}
