import fs from "node:fs";
import { fileURLToPath } from "node:url";
import type { EnvironmentClass } from "@shared/environment";
import type { RiskAssessment, RiskLevel } from "@shared/terminal";
import { splitCommand } from "./policy";

export interface VerbCatalog {
  // Closed list offered to the translation backend
  supported: string[];
  high: ReadonlySet<string>;
  medium: ReadonlySet<string>;
  highPatterns: ReadonlyArray<{ id: string; pattern: RegExp }>;
}

export class VerbCatalogError extends Error {
  constructor(source: string, detail: string) {
    super(`Invalid verb catalog (${source}): ${detail}`);
    this.name = "VerbCatalogError";
  }
}

const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("./verbCatalog.json", import.meta.url));

// Split on whitespace, resource separators and shell operators so that a verb
// hidden in a chained command is still seen.
const TOKEN_SEPARATORS = /[\s/=,;|&()`<>]+/;
const SHELL_SEPARATORS = /[;|&()`<>]+/;
const QUOTES = /["']/g;

export const SCALE_TO_ZERO_RULE = "scale-to-zero";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readVerbList(raw: Record<string, unknown>, key: string, source: string): string[] {
  const value = raw[key];
  if (!Array.isArray(value)) {
    throw new VerbCatalogError(source, `"${key}" must be an array of verbs`);
  }
  return value.map((verb) => {
    if (typeof verb !== "string" || !verb.trim()) {
      throw new VerbCatalogError(source, `"${key}" contains an empty or non-string verb`);
    }
    return verb.trim().toLowerCase();
  });
}

export function parseVerbCatalog(raw: unknown, source = "inline"): VerbCatalog {
  if (!isRecord(raw)) {
    throw new VerbCatalogError(source, "expected a JSON object");
  }
  const record = raw;

  const high = readVerbList(record, "high", source);
  const medium = readVerbList(record, "medium", source);
  const supported = record.supported === undefined ? [] : readVerbList(record, "supported", source);

  const rawPatterns = record.highPatterns ?? [];
  if (!Array.isArray(rawPatterns)) {
    throw new VerbCatalogError(source, `"highPatterns" must be an array`);
  }
  const highPatterns = rawPatterns.map((entry: unknown, index) => {
    const id = isRecord(entry) ? entry.id : undefined;
    const pattern = isRecord(entry) ? entry.pattern : undefined;
    if (typeof id !== "string" || typeof pattern !== "string") {
      throw new VerbCatalogError(source, `highPatterns[${index}] needs string "id" and "pattern"`);
    }
    try {
      return { id, pattern: new RegExp(pattern) };
    } catch (error) {
      throw new VerbCatalogError(
        source,
        `highPatterns[${index}] is not a valid expression: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  });

  return {
    supported: Array.from(new Set([...supported, ...medium, ...high])),
    high: new Set(high),
    medium: new Set(medium),
    highPatterns,
  };
}

export function loadVerbCatalog(filePath: string = DEFAULT_CATALOG_PATH): VerbCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new VerbCatalogError(filePath, error instanceof Error ? error.message : String(error));
  }
  return parseVerbCatalog(raw, filePath);
}

let defaultCatalog: VerbCatalog | null = null;

export function getDefaultVerbCatalog(): VerbCatalog {
  if (!defaultCatalog) {
    defaultCatalog = loadVerbCatalog();
  }
  return defaultCatalog;
}

/**
 * The words kubectl would receive, quotes removed and lower-cased, with
 * chained commands broken apart.
 */
function argumentWords(command: string): string[] {
  return splitCommand(command)
    .flatMap((token) => token.replace(QUOTES, "").toLowerCase().split(SHELL_SEPARATORS))
    .filter(Boolean);
}

export function tokenizeForRisk(command: string): string[] {
  return argumentWords(command)
    .flatMap((word) => word.split(TOKEN_SEPARATORS))
    .filter(Boolean);
}

function replicaValues(words: string[]): string[] {
  const values: string[] = [];
  words.forEach((word, index) => {
    if (word === "--replicas" && index + 1 < words.length) values.push(words[index + 1]);
    else if (word.startsWith("--replicas=")) values.push(word.slice("--replicas=".length));
  });
  return values;
}

export function scalesToZero(command: string): boolean {
  return replicaValues(argumentWords(command)).some((value) => value.trim() !== "" && Number(value) === 0);
}

/**
 * Classify a command at the highest risk present anywhere in the string.
 * Total and deterministic: any input yields exactly one level.
 */
export function assessRisk(
  command: string,
  catalog: VerbCatalog = getDefaultVerbCatalog(),
): RiskAssessment {
  const tokens = tokenizeForRisk(command);
  const normalized = tokens.join(" ");

  const highVerb = tokens.find((token) => catalog.high.has(token));
  if (highVerb) return { level: "HIGH", matchedRule: highVerb };

  if (scalesToZero(command)) return { level: "HIGH", matchedRule: SCALE_TO_ZERO_RULE };

  const highPattern = catalog.highPatterns.find(({ pattern }) => pattern.test(normalized));
  if (highPattern) return { level: "HIGH", matchedRule: highPattern.id };

  const mediumVerb = tokens.find((token) => catalog.medium.has(token));
  if (mediumVerb) return { level: "MEDIUM", matchedRule: mediumVerb };

  return { level: "LOW" };
}

// The environment decides the confirmation modality, not the level.
export function classify(
  command: string,
  _environmentClass: EnvironmentClass,
  catalog?: VerbCatalog,
): RiskLevel {
  return assessRisk(command, catalog).level;
}
