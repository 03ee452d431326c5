import type { Word } from "../types.js";
import type { ReadonlyWordIndex } from "../wordIndex.js";
import type { Ranker, RankContext } from "../ranker.js";
import { DEFAULT_SUGGESTION_CONFIG, type Suggester, type SuggestionConfig } from "../suggester.js";
import { knownEdits, prefixCompletions, splits } from "./candidates.js";
import { levenshtein } from "./distance.js";
import { WeightedRanker } from "./weightedRanker.js";

const COUNT_KEYS = ["maxEditDistance", "maxSuggestions", "prefixLimit"] as const;
const WEIGHT_KEYS = ["editDistanceWeight", "frequencyWeight", "phoneticWeight", "prefixWeight"] as const;

function validate(config: SuggestionConfig): void {
  for (const key of [...COUNT_KEYS, ...WEIGHT_KEYS]) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0) throw new RangeError(`${key} must be a non-negative number`);
  }
  for (const key of COUNT_KEYS) {
    if (!Number.isInteger(config[key])) throw new RangeError(`${key} must be an integer`);
  }
}

export interface SuggestionEngineDeps {
  /** Borrowed; whoever owns the index keeps it alive for the engine's lifetime. */
  index: ReadonlyWordIndex;
  ranker?: Ranker;
  config?: Partial<SuggestionConfig>;
}

/**
 * Candidate generation + ranking over a read-only index handle.
 *
 * `suggest` unions:
 * - single edits (delete, insert, substitute, transpose) that are dictionary words
 * - two-word splits whose halves are both dictionary words
 * - the whole phonetic bucket of the input
 * - prefix completions within `maxEditDistance` of the input
 */
export class SuggestionEngine implements Suggester {
  private readonly index: ReadonlyWordIndex;
  private readonly ranker: Ranker;
  private current: SuggestionConfig;

  constructor(deps: SuggestionEngineDeps) {
    this.index = deps.index;
    this.ranker = deps.ranker ?? new WeightedRanker();
    this.current = { ...DEFAULT_SUGGESTION_CONFIG, ...deps.config };
    validate(this.current);
  }

  get config(): Readonly<SuggestionConfig> {
    return this.current;
  }

  configure(patch: Partial<SuggestionConfig>): void {
    const next = { ...this.current, ...patch };
    validate(next);
    this.current = next;
  }

  suggest(word: Word): Word[] {
    if (!word.length) return [];
    const w = word.toLowerCase();

    const candidates = new Set<Word>(knownEdits(w, this.index));
    for (const c of splits(w, this.index)) candidates.add(c);
    for (const c of this.index.phoneticMatches(w)) candidates.add(c);
    for (const c of prefixCompletions(w, this.index, this.current.prefixLimit)) {
      if (levenshtein(w, c) <= this.current.maxEditDistance) candidates.add(c);
    }

    return this.ranker.rank(w, candidates, this.context(), this.current.maxSuggestions).map((s) => s.word);
  }

  suggestByEditDistance(word: Word, maxDistance: number = this.current.maxEditDistance): Word[] {
    const w = word.toLowerCase();
    const hits: Array<{ word: Word; distance: number; frequency: number }> = [];

    for (const candidate of this.index.allWords()) {
      const distance = levenshtein(w, candidate);
      if (distance <= maxDistance) {
        hits.push({ word: candidate, distance, frequency: this.index.frequency(candidate) });
      }
    }

    hits.sort(
      (a, b) =>
        a.distance - b.distance || b.frequency - a.frequency || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0),
    );
    return hits.slice(0, this.current.maxSuggestions).map((h) => h.word);
  }

  score(original: Word, candidate: Word): number {
    return this.ranker.score(original, candidate, this.context());
  }

  private context(): RankContext {
    const c = this.current;
    return {
      index: this.index,
      weights: {
        editDistance: c.editDistanceWeight,
        frequency: c.frequencyWeight,
        phonetic: c.phoneticWeight,
        prefix: c.prefixWeight,
      },
    };
  }
}
