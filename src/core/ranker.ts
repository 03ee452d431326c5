import type { ScoredCandidate, Word } from "./types.js";
import type { ReadonlyWordIndex } from "./wordIndex.js";

export interface RankWeights {
  editDistance: number;
  frequency: number;
  phonetic: number;
  prefix: number;
}

export interface RankContext {
  index: ReadonlyWordIndex;
  weights: RankWeights;
}

/**
 * Scores correction candidates for a misspelled word.
 */
export interface Ranker {
  score(original: Word, candidate: Word, ctx: RankContext): number;
  /** Best `limit` candidates, highest score first, ties by word ascending. */
  rank(original: Word, candidates: Iterable<Word>, ctx: RankContext, limit: number): ScoredCandidate[];
}
