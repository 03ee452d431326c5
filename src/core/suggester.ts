import type { Word } from "./types.js";

export interface SuggestionConfig {
  maxEditDistance: number;
  maxSuggestions: number;
  editDistanceWeight: number;
  frequencyWeight: number;
  phoneticWeight: number;
  prefixWeight: number;
  /** Words requested from the index per prefix query. */
  prefixLimit: number;
}

export const DEFAULT_SUGGESTION_CONFIG: Readonly<SuggestionConfig> = {
  maxEditDistance: 2,
  maxSuggestions: 10,
  editDistanceWeight: 1.0,
  frequencyWeight: 0.5,
  phoneticWeight: 0.3,
  prefixWeight: 0.2,
  prefixLimit: 20,
};

export type SuggestStrategy = "combined" | "edit-distance";

/**
 * Generates ranked corrections for a misspelled word.
 * Every call is a pure function of the word, the index contents and the config.
 */
export interface Suggester {
  readonly config: Readonly<SuggestionConfig>;
  configure(patch: Partial<SuggestionConfig>): void;

  suggest(word: Word): Word[];
  /** Exhaustive scan of the dictionary; O(|dictionary| · len²). */
  suggestByEditDistance(word: Word, maxDistance?: number): Word[];
  score(original: Word, candidate: Word): number;
}
