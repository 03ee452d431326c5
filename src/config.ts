import { parseIntParam } from "./http/validation.js";

export interface AppConfig {
  port: number;
  dictionaryPath: string;
  maxSuggestions: number;
  maxEditDistance: number;
  metricsEnabled: boolean;
}

export const DEFAULT_DICTIONARY_PATH = "dictionaries/en_US.dict";

type Env = Record<string, string | undefined>;

function intVar(env: Env, name: string, fallback: number, min: number, max: number, problems: string[]): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = parseIntParam(raw);
  if (n === undefined || n < min || n > max) {
    problems.push(`${name} must be an integer between ${min} and ${max} (got "${raw}")`);
    return fallback;
  }
  return n;
}

/** Reads configuration from environment variables; throws listing every invalid one. */
export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];
  const config: AppConfig = {
    port: intVar(env, "PORT", 3000, 0, 65535, problems),
    dictionaryPath: env.DICTIONARY_PATH || DEFAULT_DICTIONARY_PATH,
    maxSuggestions: intVar(env, "MAX_SUGGESTIONS", 10, 1, 100, problems),
    maxEditDistance: intVar(env, "MAX_EDIT_DISTANCE", 2, 0, 5, problems),
    metricsEnabled: env.METRICS_ENABLED === "1",
  };

  if (problems.length) throw new Error(`invalid configuration:\n  ${problems.join("\n  ")}`);
  return config;
}
