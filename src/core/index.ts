export type * from "./types.js";
export type * from "./trie.js";
export type * from "./heap.js";
export type * from "./ranker.js";
export type * from "./tokenizer.js";
export type * from "./wordIndex.js";
export type { Suggester, SuggestionConfig, SuggestStrategy } from "./suggester.js";
export { DEFAULT_SUGGESTION_CONFIG } from "./suggester.js";
export { DictionaryParseError } from "./errors.js";
export * from "./impl/index.js";
