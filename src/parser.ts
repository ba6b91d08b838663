import { jsonrepair } from "jsonrepair";
import { SchemaError } from "./errors.js";

export interface ParseResult {
  readonly value: unknown;
  /** Descriptions of the fixes applied to reach `value`; empty for strict JSON. */
  readonly warnings: readonly string[];
}

/** Must throw an UnparsableResponse SchemaError for input it cannot recover. */
export type ResponseParser = (text: string) => ParseResult;

const CODE_BLOCK = /```([\w-]*)[ \t]*\r?\n?([\s\S]*?)```/;

function tryStrict(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function findMatchingBracketEnd(text: string, start: number): number {
  const open = text[start];
  const close = open === "{" ? "}" : "]";
  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (inString) {
      if (c === "\\") {
        i++;
      } else if (c === '"') {
        inString = false;
      }
      continue;
    }
    if (c === '"') {
      inString = true;
    } else if (c === open) {
      depth++;
    } else if (c === close) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** First balanced `{...}` or `[...]` region, whichever opens first. */
function extractBalanced(text: string): string | null {
  const objIndex = text.indexOf("{");
  const arrIndex = text.indexOf("[");
  const start =
    objIndex < 0 ? arrIndex : arrIndex < 0 ? objIndex : Math.min(objIndex, arrIndex);
  if (start < 0) return null;
  const end = findMatchingBracketEnd(text, start);
  return end < 0 ? null : text.slice(start, end + 1);
}

function tryRepair(text: string): { ok: true; value: unknown } | { ok: false; reason: string } {
  try {
    const value: unknown = JSON.parse(jsonrepair(text));
    return { ok: true, value };
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Lenient JSON parsing for model output. Tries, in order: strict JSON, the
 * body of a markdown code fence, the first balanced object or array in the
 * text, then a repair pass for unquoted keys, trailing commas and the like.
 */
export function parseJsonish(text: string): ParseResult {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new SchemaError({
      kind: "UnparsableResponse",
      message: "Response is empty",
      context: { text },
    });
  }

  const strict = tryStrict(trimmed);
  if (strict.ok) {
    return { value: strict.value, warnings: [] };
  }

  const warnings: string[] = [];
  let candidate = trimmed;

  const fence = CODE_BLOCK.exec(trimmed);
  if (fence) {
    candidate = (fence[2] ?? "").trim();
    warnings.push(`ExtractedFromMarkdown:${fence[1] || "plain"}`);
    const fenced = tryStrict(candidate);
    if (fenced.ok) {
      return { value: fenced.value, warnings };
    }
  }

  const region = extractBalanced(candidate);
  if (region !== null && region !== candidate) {
    const extracted = tryStrict(region);
    if (extracted.ok) {
      warnings.push("ExtractedFromSurroundingText");
      return { value: extracted.value, warnings };
    }
  }

  const repaired = tryRepair(region ?? candidate);
  if (repaired.ok) {
    if (region !== null && region !== candidate) {
      warnings.push("ExtractedFromSurroundingText");
    }
    warnings.push("RepairedMalformedJson");
    return { value: repaired.value, warnings };
  }

  throw new SchemaError({
    kind: "UnparsableResponse",
    message: `Response could not be parsed as JSON: ${repaired.reason}`,
    context: { text: text.length > 500 ? `${text.slice(0, 500)}...` : text, warnings },
    hint: "Ask the model to answer with a single JSON value matching the schema",
  });
}
