import { readFileSync } from "node:fs";
import { isRecord, mapEntries } from "./data.js";
import {
  HumanizePatternFileSchema,
  PhraseTableSchema,
  type PhraseTable,
} from "./schemas/humanize-patterns.js";

export type Humanizer = (text: string) => string;

export interface HumanizeOptions {
  /** Also apply the aggressive tier (hedging, buzzwords, cliches). */
  readonly aggressive?: boolean;
  /** Replaces the built-in tables entirely; `aggressive` is then ignored. */
  readonly patterns?: PhraseTable;
}

// Resolves from both src/ and dist/.
const PATTERN_FILE = new URL("../data/humanize-patterns.json", import.meta.url);

const patternFile = HumanizePatternFileSchema.parse(JSON.parse(readFileSync(PATTERN_FILE, "utf-8")));

function mergeTables(tables: Record<string, PhraseTable>): Readonly<PhraseTable> {
  const merged: PhraseTable = {};
  for (const table of Object.values(tables)) {
    Object.assign(merged, table);
  }
  return Object.freeze(merged);
}

/** Model self-reference, refusals, training-data disclaimers and dash overuse. */
export const SAFE_PATTERNS = mergeTables(patternFile.safe);

/** Hedging, overused verbs, adjectives and nouns, opening and closing cliches. May hit ordinary prose. */
export const AGGRESSIVE_PATTERNS = mergeTables(patternFile.aggressive);

export const DEFAULT_PATTERNS: Readonly<PhraseTable> = Object.freeze({
  ...SAFE_PATTERNS,
  ...AGGRESSIVE_PATTERNS,
});

const WORD_CHAR = /[\p{L}\p{N}_]/u;
const EXCLUSION_ZONES = /```[\s\S]*?```|`[^`]+`|https?:\/\/\S+|[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

interface CompiledPattern {
  readonly regex: RegExp;
  readonly replacement: string;
  readonly keepCase: boolean;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isSingleWord(text: string): boolean {
  return !/\s/.test(text);
}

/** Word boundaries only on the sides where the phrase starts or ends with a word character. */
function compilePattern(phrase: string, replacement: string): CompiledPattern {
  const prefix = WORD_CHAR.test(phrase.charAt(0)) ? "(?<=^|[^\\p{L}\\p{N}_])" : "";
  const suffix = WORD_CHAR.test(phrase.charAt(phrase.length - 1)) ? "(?=$|[^\\p{L}\\p{N}_])" : "";
  return {
    regex: new RegExp(`${prefix}${escapeRegExp(phrase)}${suffix}`, "giu"),
    replacement,
    keepCase: isSingleWord(phrase) && isSingleWord(replacement) && replacement.length > 0,
  };
}

function matchCase(matched: string, replacement: string): string {
  const letters = [...matched].filter((char) => /\p{L}/u.test(char));
  if (letters.length > 0 && letters.every((char) => /\p{Lu}/u.test(char))) {
    return replacement.toUpperCase();
  }
  if (/^\p{Lu}/u.test(matched)) {
    return replacement.charAt(0).toUpperCase() + replacement.slice(1);
  }
  return replacement;
}

function cleanupArtifacts(text: string): string {
  return text
    .replace(/,\s*,/g, ",")
    .replace(/\.\s*\./g, ".")
    .replace(/;\s*;/g, ";")
    .replace(/\s+([,.;:!?])/g, "$1")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^[\s,;:]+/, "");
}

/** Code spans, fenced blocks, URLs and e-mail addresses pass through untouched. */
function withExclusionZones(text: string, transform: (text: string) => string): string {
  const zones: string[] = [];
  const protectedText = text.replace(EXCLUSION_ZONES, (zone) => {
    zones.push(zone);
    return `\u0000EXCL${zones.length - 1}\u0000`;
  });
  if (zones.length === 0) return transform(text);

  let restored = transform(protectedText);
  zones.forEach((zone, index) => {
    restored = restored.split(`\u0000EXCL${index}\u0000`).join(zone);
  });
  return restored;
}

function selectPatterns(options: HumanizeOptions): Readonly<PhraseTable> {
  if (options.patterns !== undefined) return PhraseTableSchema.parse(options.patterns);
  return options.aggressive === true ? DEFAULT_PATTERNS : SAFE_PATTERNS;
}

/**
 * Builds a function that strips model-style phrasing from text. Phrases are
 * matched case-insensitively, longest first, and a one-word replacement
 * takes the case of the word it replaces.
 *
 * @example
 * createHumanizer()("As an AI, I think so.")                    // "I think so."
 * createHumanizer({ aggressive: true })("We should leverage it.") // "We should use it."
 */
export function createHumanizer(options: HumanizeOptions = {}): Humanizer {
  const compiled = Object.entries(selectPatterns(options))
    .sort(([a], [b]) => b.length - a.length)
    .map(([phrase, replacement]) => compilePattern(phrase, replacement));

  const apply = (text: string) => {
    let result = text;
    for (const { regex, replacement, keepCase } of compiled) {
      result = result.replace(regex, (matched) => (keepCase ? matchCase(matched, replacement) : replacement));
    }
    return cleanupArtifacts(result);
  };

  return (text) => withExclusionZones(text, apply);
}

export const defaultHumanizer: Humanizer = createHumanizer();

export function humanizeString(text: string, options: HumanizeOptions = {}): string {
  return createHumanizer(options)(text);
}

/** Humanizes every string inside arrays and plain objects; keys are kept. */
export function humanizeData(data: unknown, options: HumanizeOptions = {}): unknown {
  const humanizer = createHumanizer(options);
  const walk = (value: unknown): unknown => {
    if (typeof value === "string") return humanizer(value);
    if (Array.isArray(value)) return value.map(walk);
    if (isRecord(value)) return mapEntries(value, (key, entry) => [key, walk(entry)]);
    return value;
  };
  return walk(data);
}
