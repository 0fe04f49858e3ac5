import { ConfigError } from "../core/gate/errors";
import { DEFAULTS } from "./defaults";

export interface AppConfig {
  criticModel: string;
  imageModel: string;
  geminiBaseUrl: string;
  threshold: number;
  maxRounds: number;
  callTimeoutMs: number;
  retries: number;
  backoffMs: number;
  packsRoot: string;
  databaseUrl: string;
  // Opcionales: solo se agregan si existen (no se asigna undefined)
  geminiApiKey?: string;
  databaseAuthToken?: string;
  telegram?: { token: string; operatorChatId: string };
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const cfg: AppConfig = {
    criticModel: str(env, "CRITIC_MODEL") ?? DEFAULTS.CRITIC_MODEL,
    imageModel: str(env, "IMAGE_MODEL") ?? DEFAULTS.IMAGE_MODEL,
    geminiBaseUrl: str(env, "GEMINI_BASE_URL") ?? DEFAULTS.GEMINI_BASE_URL,
    threshold: num(env, "QA_THRESHOLD", DEFAULTS.QA_THRESHOLD),
    maxRounds: num(env, "QA_MAX_ROUNDS", DEFAULTS.QA_MAX_ROUNDS),
    callTimeoutMs: num(env, "QA_CALL_TIMEOUT_MS", DEFAULTS.QA_CALL_TIMEOUT_MS),
    retries: num(env, "QA_RETRIES", DEFAULTS.QA_RETRIES),
    backoffMs: num(env, "QA_BACKOFF_MS", DEFAULTS.QA_BACKOFF_MS),
    packsRoot: str(env, "PACKS_ROOT") ?? DEFAULTS.PACKS_ROOT,
    databaseUrl: str(env, "QA_DATABASE_URL") ?? DEFAULTS.QA_DATABASE_URL,
  };

  const apiKey = str(env, "GEMINI_API_KEY");
  if (apiKey) cfg.geminiApiKey = apiKey;
  const authToken = str(env, "QA_DATABASE_AUTH_TOKEN");
  if (authToken) cfg.databaseAuthToken = authToken;

  const telegramToken = str(env, "TELEGRAM_TOKEN");
  if (telegramToken) {
    cfg.telegram = { token: telegramToken, operatorChatId: must(env, "TELEGRAM_OPERATOR_CHAT_ID") };
  }

  return cfg;
}

export function must(env: Env, k: string): string {
  const v = str(env, k);
  if (!v) throw new ConfigError(`Missing environment variable: ${k}`);
  return v;
}

function str(env: Env, k: string): string | undefined {
  const v = env[k]?.trim();
  return v ? v : undefined;
}

function num(env: Env, k: string, def: number): number {
  const raw = str(env, k);
  if (raw === undefined) return def;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ConfigError(`${k} must be a number, got "${raw}"`);
  return n;
}
