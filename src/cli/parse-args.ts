export type RenderArgs = {
  command: "render";
  specPath: string;
  prompt: boolean;
  outputPath?: string;
};

export type HumanizeMode = "safe" | "aggressive";

export type DecodeArgs = {
  command: "decode";
  specPath: string;
  responsePath: string;
  validate: boolean;
  humanize?: HumanizeMode;
  outputPath?: string;
};

export type ValidateArgs = {
  command: "validate";
  specPath: string;
  dataPath: string;
};

export type HelpArgs = {
  command: "help";
  topic?: "render" | "decode" | "validate";
};

export type ParsedArgs = RenderArgs | DecodeArgs | ValidateArgs | HelpArgs;

export type ParseError = {
  error: string;
  usage?: string;
};

export type ParseResult =
  | { ok: true; args: ParsedArgs }
  | { ok: false; error: ParseError };

function extractOutput(
  args: string[],
): { outputPath?: string; rest: string[] } {
  const rest: string[] = [];
  let outputPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === "--output" || arg === "-o") {
      const next = args[i + 1];
      if (!next || next.startsWith("-")) {
        // Left in place so the caller reports it as an unknown flag
        rest.push(arg);
        continue;
      }
      outputPath = next;
      i++; // skip next
    } else if (arg.startsWith("--output=")) {
      outputPath = arg.slice("--output=".length);
    } else {
      rest.push(arg);
    }
  }

  return { outputPath, rest };
}

// "-" names stdin, so it counts as a positional
function positionalsOf(args: string[]): string[] {
  return args.filter((a) => a === "-" || !a.startsWith("-"));
}

function unknownFlag(args: string[], known: string[], command: string): ParseResult | null {
  const flag = args.find((a) => a !== "-" && a.startsWith("-") && !known.includes(a));
  if (flag === undefined) return null;
  return {
    ok: false,
    error: {
      error: `Unknown option for ${command}: ${flag}`,
      usage: `Run "schemacast ${command} --help" for usage information.`,
    },
  };
}

function missing(argument: string, command: string): ParseResult {
  return {
    ok: false,
    error: {
      error: `Missing required argument: ${argument}`,
      usage: `Run "schemacast ${command} --help" for usage information.`,
    },
  };
}

function parseRenderArgs(args: string[]): ParseResult {
  if (args.includes("--help") || args.includes("-h")) {
    return { ok: true, args: { command: "help", topic: "render" } };
  }

  const { outputPath, rest } = extractOutput(args);
  const bad = unknownFlag(rest, ["--prompt"], "render");
  if (bad) return bad;

  const prompt = rest.includes("--prompt");
  const specPath = positionalsOf(rest)[0];
  if (!specPath) {
    return missing("<spec_file>", "render");
  }

  return { ok: true, args: { command: "render", specPath, prompt, outputPath } };
}

function parseDecodeArgs(args: string[]): ParseResult {
  if (args.includes("--help") || args.includes("-h")) {
    return { ok: true, args: { command: "help", topic: "decode" } };
  }

  const { outputPath, rest } = extractOutput(args);
  const bad = unknownFlag(rest, ["--validate", "--humanize", "--aggressive"], "decode");
  if (bad) return bad;

  const validate = rest.includes("--validate");
  // --aggressive implies --humanize
  const humanize: HumanizeMode | undefined = rest.includes("--aggressive")
    ? "aggressive"
    : rest.includes("--humanize")
      ? "safe"
      : undefined;
  const [specPath, responsePath] = positionalsOf(rest);
  if (!specPath) {
    return missing("<spec_file>", "decode");
  }
  if (!responsePath) {
    return missing("<response_file>", "decode");
  }

  return {
    ok: true,
    args: {
      command: "decode",
      specPath,
      responsePath,
      validate,
      ...(humanize === undefined ? {} : { humanize }),
      outputPath,
    },
  };
}

function parseValidateArgs(args: string[]): ParseResult {
  if (args.includes("--help") || args.includes("-h")) {
    return { ok: true, args: { command: "help", topic: "validate" } };
  }

  const bad = unknownFlag(args, [], "validate");
  if (bad) return bad;

  const [specPath, dataPath] = positionalsOf(args);
  if (!specPath) {
    return missing("<spec_file>", "validate");
  }
  if (!dataPath) {
    return missing("<data_file>", "validate");
  }

  return { ok: true, args: { command: "validate", specPath, dataPath } };
}

export function parseArgs(argv: string[]): ParseResult {
  // argv[0] = node, argv[1] = script path, argv[2+] = user args
  const args = argv.slice(2);
  const command = args[0];

  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    return { ok: true, args: { command: "help" } };
  }

  switch (command) {
    case "render":
      return parseRenderArgs(args.slice(1));
    case "decode":
      return parseDecodeArgs(args.slice(1));
    case "validate":
      return parseValidateArgs(args.slice(1));
    default:
      return {
        ok: false,
        error: {
          error: `Unknown command: ${command}`,
          usage: 'Run "schemacast --help" for usage information.',
        },
      };
  }
}
