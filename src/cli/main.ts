#!/usr/bin/env node
import { parseArgs } from "./parse-args.js";
import { EXIT_FAILURE, EXIT_OK, runDecode, runRender, runValidate } from "./commands.js";
import { usageFor } from "./help.js";

function main(): number {
  const result = parseArgs(process.argv);

  if (!result.ok) {
    console.error(`Error: ${result.error.error}`);
    if (result.error.usage) {
      console.error(result.error.usage);
    }
    return EXIT_FAILURE;
  }

  const { args } = result;

  switch (args.command) {
    case "help":
      console.log(usageFor(args.topic));
      return EXIT_OK;
    case "render":
      return runRender(args);
    case "decode":
      return runDecode(args);
    case "validate":
      return runValidate(args);
  }
}

try {
  process.exitCode = main();
} catch (err: unknown) {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exitCode = EXIT_FAILURE;
}
