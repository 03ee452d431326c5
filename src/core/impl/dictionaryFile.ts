import type { WordEntry } from "../types.js";
import { DictionaryParseError } from "../errors.js";

const FREQUENCY = /^\d+$/;

/**
 * Parses the `word` / `word:frequency` line format.
 *
 * Lines are trimmed and blank lines skipped. A frequency that is not an
 * unsigned decimal integer, or does not fit a safe integer, aborts the whole
 * parse.
 */
export function parseDictionary(text: string, path = "<input>"): WordEntry[] {
  const entries: WordEntry[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? "").trim();
    if (!line.length) continue;

    const colon = line.indexOf(":");
    if (colon < 0) {
      entries.push({ word: line, frequency: 1 });
      continue;
    }

    const raw = line.slice(colon + 1).trim();
    const frequency = Number(raw);
    if (!FREQUENCY.test(raw) || !Number.isSafeInteger(frequency)) throw new DictionaryParseError(path, i + 1, line);
    entries.push({ word: line.slice(0, colon).trim(), frequency });
  }

  return entries;
}

/** One `word:frequency` line per entry, sorted by word. */
export function serializeDictionary(entries: Iterable<WordEntry>): string {
  const sorted = Array.from(entries).sort((a, b) => (a.word < b.word ? -1 : a.word > b.word ? 1 : 0));
  return sorted.map((e) => `${e.word}:${e.frequency}\n`).join("");
}
