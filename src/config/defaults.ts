export const DEFAULTS = {
  CRITIC_MODEL: "gemini-2.5-flash",
  IMAGE_MODEL: "gemini-2.5-flash-image",
  GEMINI_BASE_URL: "https://generativelanguage.googleapis.com",
  QA_THRESHOLD: 8.5,
  QA_MAX_ROUNDS: 3,
  QA_CALL_TIMEOUT_MS: 120_000,
  QA_RETRIES: 1,
  QA_BACKOFF_MS: 500,
  PACKS_ROOT: "packs",
  QA_DATABASE_URL: "file:packs/qa.db",
} as const;
