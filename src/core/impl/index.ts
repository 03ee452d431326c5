export { ArenaTrie } from "./arenaTrie.js";
export { MemoryWordIndex } from "./memoryWordIndex.js";
export { parseDictionary, serializeDictionary } from "./dictionaryFile.js";
export { phoneticCode } from "./phonetic.js";
export { levenshtein, damerauLevenshtein, commonPrefixLength } from "./distance.js";
export { keyboardDistance, UNKNOWN_KEY_DISTANCE } from "./keyboard.js";
export { deletions, insertions, substitutions, transpositions, splits, prefixCompletions, knownEdits } from "./candidates.js";
export { MinHeapTopKSelector, WorstFirstHeap } from "./minHeapTopK.js";
export { WeightedRanker, compareScored } from "./weightedRanker.js";
export { SuggestionEngine, type SuggestionEngineDeps } from "./suggestionEngine.js";
export { TextTokenizer } from "./textTokenizer.js";
export { SpellChecker, normalizeWord, type SpellCheckerDeps } from "./spellChecker.js";
