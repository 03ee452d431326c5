import type { ScoredCandidate, Word } from "../types.js";
import type { RankContext, Ranker } from "../ranker.js";
import type { TopKSelector } from "../heap.js";
import { commonPrefixLength, levenshtein } from "./distance.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";
import { phoneticCode } from "./phonetic.js";

const LENGTH_WEIGHT = 0.1;

export function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  return b.score - a.score || (a.word < b.word ? -1 : a.word > b.word ? 1 : 0);
}

/**
 * Linear blend of closeness signals:
 *
 *   wEdit     * 1 / (1 + levenshtein)
 * + wFreq     * ln(1 + frequency) / 10
 * + 0.1       * shorter length / longer length
 * + wPrefix   * common prefix / original length
 * + wPhonetic * (same phonetic code ? 1 : 0)
 */
export class WeightedRanker implements Ranker {
  constructor(private readonly selector: TopKSelector<ScoredCandidate> = new MinHeapTopKSelector<ScoredCandidate>()) {}

  score(original: Word, candidate: Word, ctx: RankContext): number {
    const { weights, index } = ctx;
    const longer = Math.max(original.length, candidate.length);

    let score = weights.editDistance / (1 + levenshtein(original, candidate));
    score += (weights.frequency * Math.log(1 + index.frequency(candidate))) / 10;
    score += longer ? (LENGTH_WEIGHT * Math.min(original.length, candidate.length)) / longer : 0;
    if (original.length) {
      score += (weights.prefix * commonPrefixLength(original, candidate)) / original.length;
    }
    if (phoneticCode(original) === phoneticCode(candidate)) score += weights.phonetic;
    return score;
  }

  rank(original: Word, candidates: Iterable<Word>, ctx: RankContext, limit: number): ScoredCandidate[] {
    const scored = Array.from(candidates, (word) => ({ word, score: this.score(original, word, ctx) }));
    return this.selector.topK(scored, limit, compareScored);
  }
}
