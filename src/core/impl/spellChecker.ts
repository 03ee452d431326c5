import { readFileSync } from "node:fs";

import type { IndexStats, Misspelling, Word } from "../types.js";
import type { WordIndex } from "../wordIndex.js";
import type { Tokenizer, TokenizeOptions } from "../tokenizer.js";
import type { Suggester, SuggestStrategy } from "../suggester.js";
import { MemoryWordIndex } from "./memoryWordIndex.js";
import { SuggestionEngine } from "./suggestionEngine.js";
import { TextTokenizer } from "./textTokenizer.js";

const NON_WORD_CHARS = /[^A-Za-z0-9']/g;

/** Strips everything but letters, digits and apostrophes, then lowercases. */
export function normalizeWord(word: Word): Word {
  return word.replace(NON_WORD_CHARS, "").toLowerCase();
}

export interface SpellCheckerDeps {
  index?: WordIndex;
  tokenizer?: Tokenizer;
  /** Built over `index` when omitted. */
  suggester?: Suggester;
  tokenizeOptions?: TokenizeOptions;
}

/**
 * Coordinator: owns the index, feeds it tokens, asks the suggester for fixes.
 */
export class SpellChecker {
  readonly index: WordIndex;
  readonly suggester: Suggester;
  private readonly tokenizer: Tokenizer;
  private readonly tokenizeOptions: TokenizeOptions;

  constructor(deps: SpellCheckerDeps = {}) {
    this.index = deps.index ?? new MemoryWordIndex();
    this.tokenizer = deps.tokenizer ?? new TextTokenizer();
    this.suggester = deps.suggester ?? new SuggestionEngine({ index: this.index });
    this.tokenizeOptions = deps.tokenizeOptions ?? {};
  }

  loadDictionary(path: string): boolean {
    return this.index.loadFromFile(path);
  }

  saveDictionary(path: string): boolean {
    return this.index.saveToFile(path);
  }

  addWord(word: Word, frequency?: number): void {
    this.index.insert(word.trim(), frequency);
  }

  removeWord(word: Word): boolean {
    return this.index.remove(word.trim());
  }

  isCorrect(word: Word): boolean {
    const w = word.trim();
    if (!w.length) return true;
    if (this.tokenizer.isIgnored(w, this.tokenizeOptions)) return true;

    for (const tok of this.tokenizer.tokenize(w, { ...this.tokenizeOptions, normalizeCase: true })) {
      if (!this.index.contains(tok.term)) return false;
    }
    return true;
  }

  suggestions(word: Word, strategy: SuggestStrategy = "combined", maxDistance?: number): Word[] {
    const w = normalizeWord(word);
    if (!w.length) return [];
    return strategy === "edit-distance" ? this.suggester.suggestByEditDistance(w, maxDistance) : this.suggester.suggest(w);
  }

  checkText(text: string): Misspelling[] {
    const out: Misspelling[] = [];
    for (const tok of this.tokenizer.tokenize(text, { ...this.tokenizeOptions, normalizeCase: true })) {
      if (this.index.contains(tok.term)) continue;
      out.push({
        word: tok.term,
        position: tok.position,
        offset: tok.startOffset,
        line: tok.line,
        column: tok.column,
        suggestions: this.suggester.suggest(tok.term),
      });
    }
    return out;
  }

  /** `undefined` when the file cannot be read. */
  checkFile(path: string): Misspelling[] | undefined {
    let text: string;
    try {
      text = readFileSync(path, "utf8");
    } catch {
      return undefined;
    }
    return this.checkText(text);
  }

  complete(prefix: string, limit: number): Word[] {
    return this.index.wordsWithPrefix(prefix.trim(), limit);
  }

  stats(): IndexStats {
    return this.index.stats();
  }
}
