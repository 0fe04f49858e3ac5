import type { EvaluatorPort } from "../../core/ports/EvaluatorPort";
import { ConfigError } from "../../core/gate/errors";
import type { AppConfig } from "../../config";
import { GeminiCritic } from "./GeminiCritic";
import { SimulatedCritic } from "./SimulatedCritic";

export type CriticMode = "gemini" | "simulated" | "auto";

/**
 * Construye el crítico de una ejecución:
 *  - gemini:    requiere GEMINI_API_KEY
 *  - simulated: siempre el crítico offline
 *  - auto:      Gemini si hay key configurada, si no simulated
 */
export function createCritic(config: AppConfig, mode: CriticMode = "auto"): EvaluatorPort {
  const key = config.geminiApiKey;

  if (mode === "simulated") return new SimulatedCritic();

  if (key) {
    return new GeminiCritic({ apiKey: key, model: config.criticModel, baseUrl: config.geminiBaseUrl });
  }
  if (mode === "gemini") {
    throw new ConfigError("GEMINI_API_KEY is required for the Gemini critic");
  }

  console.warn("[createCritic] GEMINI_API_KEY missing: using the simulated critic (non-authoritative scores).");
  return new SimulatedCritic();
}

export { GeminiCritic, CriticResponseError } from "./GeminiCritic";
export { SimulatedCritic } from "./SimulatedCritic";
