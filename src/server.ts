import { loadConfig } from "./config.js";
import { DictionaryParseError, SpellChecker, SuggestionEngine, MemoryWordIndex } from "./core/index.js";
import { startServer } from "./http/server.js";

const config = loadConfig();

const index = new MemoryWordIndex();
const suggester = new SuggestionEngine({
  index,
  config: { maxSuggestions: config.maxSuggestions, maxEditDistance: config.maxEditDistance },
});
const checker = new SpellChecker({ index, suggester });

try {
  if (checker.loadDictionary(config.dictionaryPath)) {
    console.log(`loaded dictionary ${config.dictionaryPath} (${index.wordCount()} words)`);
  } else {
    console.error(`dictionary not readable: ${config.dictionaryPath}; starting empty`);
  }
} catch (e) {
  if (!(e instanceof DictionaryParseError)) throw e;
  console.error(`${e.message}; starting empty`);
}

const { server, port } = await startServer({ port: config.port, metricsEnabled: config.metricsEnabled, checker });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

console.log(`listening on :${port}`);
