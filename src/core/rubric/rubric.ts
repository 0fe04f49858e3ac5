import { DIMENSIONS, type Dimension, type SubScores } from "../types/Pack";

export const RUBRIC: Record<Dimension, { weight: number; description: string }> = {
  brand_consistency: {
    weight: 0.3,
    description: "Colors match the brand palette, texture and mood reflect the brand tokens, composition follows the guidelines",
  },
  technical_quality: {
    weight: 0.25,
    description: "Target resolution, no compression artifacts, clarity and sharpness",
  },
  compliance: {
    weight: 0.2,
    description: "Marketplace rules: no third-party logos or trademarks, appropriate content, listing-ready formats",
  },
  visual_appeal: {
    weight: 0.25,
    description: "Professional finish, clear focal point, margins that leave room for overlays",
  },
};

export const SCORE_MIN = 0;
export const SCORE_MAX = 10;

export function isScore(n: unknown): n is number {
  return typeof n === "number" && Number.isFinite(n) && n >= SCORE_MIN && n <= SCORE_MAX;
}

/** Promedio ponderado de las dimensiones de la rúbrica. */
export function calculateOverallScore(subScores: SubScores): number {
  let weighted = 0;
  let total = 0;
  for (const dim of DIMENSIONS) {
    const { weight } = RUBRIC[dim];
    weighted += subScores[dim].score * weight;
    total += weight;
  }
  return total === 0 ? 0 : weighted / total;
}

export function scoreTrend(scores: readonly number[]): string {
  return scores.map((s) => s.toFixed(1)).join(" -> ");
}
