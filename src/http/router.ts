import type { SpellChecker } from "../core/impl/index.js";
import type { SuggestStrategy } from "../core/suggester.js";
import { problem, type FieldError, type Problem } from "./problem.js";
import { asInt, asString, isRecord, parseIntParam, pushErr, wordError } from "./validation.js";

export const SERVICE = "spell_engine";
export const VERSION = "0.1.0";

const MAX_TEXT_LENGTH = 200_000;
const MAX_BATCH = 1000;

export interface ApiRequest {
  method: string;
  url: URL;
  requestId: string;
  /** Parsed JSON body; undefined for bodiless requests. */
  body?: unknown;
}

export type ApiResponse =
  | { status: number; body: unknown; problem?: false }
  | { status: number; body: Problem; problem: true }
  | { status: number; text: string };

export interface RouterOptions {
  checker: SpellChecker;
  startedAt?: number;
  metricsEnabled?: boolean;
}

function fail(req: ApiRequest, status: number, code: Problem["code"], detail: string, errors?: FieldError[]): ApiResponse {
  return {
    status,
    problem: true,
    body: problem({ status, code, detail, instance: req.url.pathname, requestId: req.requestId, errors }),
  };
}

function isStrategy(v: unknown): v is SuggestStrategy {
  return v === "combined" || v === "edit-distance";
}

function invalid(req: ApiRequest, errors: FieldError[]): ApiResponse {
  return fail(req, 400, "INVALID_ARGUMENT", "invalid request", errors);
}

/** Routes a parsed request against the checker. Synchronous: the core never awaits. */
export function createRouter(opts: RouterOptions): (req: ApiRequest) => ApiResponse {
  const { checker } = opts;
  const startedAt = opts.startedAt ?? Date.now();
  const metricsEnabled = opts.metricsEnabled ?? false;

  return (req) => {
    const path = req.url.pathname;

    if (req.method === "GET" && path === "/health") {
      return {
        status: 200,
        body: { status: "ok", service: SERVICE, version: VERSION, uptimeMs: Date.now() - startedAt },
      };
    }

    if (req.method === "GET" && path === "/metrics") {
      if (!metricsEnabled) return fail(req, 404, "NOT_FOUND", "metrics not enabled");
      const { wordCount, memoryBytes } = checker.stats();
      return {
        status: 200,
        text: `spell_engine_words ${wordCount}\nspell_engine_memory_bytes ${memoryBytes}\n`,
      };
    }

    if (req.method === "GET" && path === "/stats") {
      return { status: 200, body: checker.stats() };
    }

    if (req.method === "GET" && path === "/complete") {
      const errors: FieldError[] = [];
      const prefix = req.url.searchParams.get("prefix") ?? "";
      if (!prefix.trim().length) pushErr(errors, "$.prefix", "must be non-empty");

      const rawLimit = req.url.searchParams.get("limit");
      const limit = rawLimit === null ? 10 : parseIntParam(rawLimit);
      if (limit === undefined || limit < 1 || limit > 100) pushErr(errors, "$.limit", "must be between 1 and 100");

      if (errors.length || limit === undefined) return invalid(req, errors);
      return { status: 200, body: { prefix, words: checker.complete(prefix, limit) } };
    }

    if (req.method === "POST" && path === "/check") {
      const body = req.body;
      if (!isRecord(body)) return fail(req, 400, "INVALID_ARGUMENT", "body must be an object");

      const errors: FieldError[] = [];
      const text = asString(body.text);
      if (text === undefined) pushErr(errors, "$.text", "must be a string");
      if (text && text.length > MAX_TEXT_LENGTH) pushErr(errors, "$.text", "too long");
      if (errors.length || text === undefined) return invalid(req, errors);

      const started = Date.now();
      const misspellings = checker.checkText(text);
      return { status: 200, body: { misspellings, tookMs: Date.now() - started } };
    }

    if (req.method === "POST" && path === "/suggest") {
      const body = req.body;
      if (!isRecord(body)) return fail(req, 400, "INVALID_ARGUMENT", "body must be an object");

      const errors: FieldError[] = [];
      const word = asString(body.word)?.trim();
      const badWord = wordError(word);
      if (badWord) pushErr(errors, "$.word", badWord);

      const strategy = body.strategy ?? "combined";
      if (!isStrategy(strategy)) pushErr(errors, "$.strategy", "must be one of: combined, edit-distance");

      let maxDistance: number | undefined;
      if (body.maxDistance != null) {
        maxDistance = asInt(body.maxDistance);
        if (maxDistance === undefined || maxDistance < 0 || maxDistance > 5) {
          pushErr(errors, "$.maxDistance", "must be an integer between 0 and 5");
        }
      }

      if (errors.length || word === undefined || !isStrategy(strategy)) return invalid(req, errors);
      const correct = checker.isCorrect(word);
      return {
        status: 200,
        body: {
          word,
          correct,
          suggestions: correct ? [] : checker.suggestions(word, strategy, maxDistance),
        },
      };
    }

    if (req.method === "POST" && path === "/words") {
      const body = req.body;
      if (!isRecord(body)) return fail(req, 400, "INVALID_ARGUMENT", "body must be an object");

      const errors: FieldError[] = [];
      const wordsVal = body.words;
      if (!Array.isArray(wordsVal)) pushErr(errors, "$.words", "must be an array");
      else if (wordsVal.length < 1) pushErr(errors, "$.words", "must contain at least 1 item");
      else if (wordsVal.length > MAX_BATCH) pushErr(errors, "$.words", `must contain at most ${MAX_BATCH} items`);
      if (errors.length || !Array.isArray(wordsVal)) return invalid(req, errors);

      let added = 0;
      const failures: Array<{ index: number; word: string | null; message: string }> = [];

      wordsVal.forEach((entry: unknown, i: number) => {
        const word = isRecord(entry) ? asString(entry.word)?.trim() : undefined;
        const badWord = wordError(word);
        if (badWord || word === undefined) {
          failures.push({ index: i, word: word || null, message: `word ${badWord ?? "must be non-empty"}` });
          return;
        }

        let frequency = 1;
        if (isRecord(entry) && entry.frequency != null) {
          const f = asInt(entry.frequency);
          if (f === undefined || f < 0) {
            failures.push({ index: i, word, message: "frequency must be a non-negative integer" });
            return;
          }
          frequency = f;
        }

        checker.addWord(word, frequency);
        added++;
      });

      const failed = failures.length;
      return { status: failed > 0 ? 207 : 200, body: { added, failed, failures } };
    }

    if (req.method === "DELETE" && path.startsWith("/words/")) {
      let word: string;
      try {
        word = decodeURIComponent(path.slice("/words/".length));
      } catch {
        return invalid(req, [{ path: "$.word", message: "malformed percent-encoding" }]);
      }
      if (!word.trim().length) return invalid(req, [{ path: "$.word", message: "must be non-empty" }]);
      if (!checker.removeWord(word)) return fail(req, 404, "NOT_FOUND", `word not in dictionary: ${word}`);
      return { status: 200, body: { removed: true } };
    }

    return fail(req, 404, "NOT_FOUND", "not found");
  };
}
