import type { FieldError } from "./problem.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

/** Safe integers only: frequencies and distances must survive a round trip. */
export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isSafeInteger(v) ? v : undefined;
}

export const MAX_WORD_LENGTH = 256;

/** Why a trimmed value cannot be a dictionary word; undefined when it can. */
export function wordError(word: string | undefined): string | undefined {
  if (!word) return "must be non-empty";
  if (word.length > MAX_WORD_LENGTH) return `must be at most ${MAX_WORD_LENGTH} characters`;
  if (/\s/.test(word)) return "must be a single token";
  return undefined;
}

/** Integer from a query-string or env value; undefined when absent or malformed. */
export function parseIntParam(v: string | null | undefined): number | undefined {
  if (v == null || !/^-?\d+$/.test(v.trim())) return undefined;
  return Number(v.trim());
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
