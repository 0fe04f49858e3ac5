import type { Decision } from "../types/Pack";
import { formatScore, pad2 } from "../utils/format";

/**
 * score >= threshold  -> STOP_ACCEPT
 * round == maxRounds  -> STOP_MAX_ROUNDS (umbral nunca alcanzado)
 * en otro caso       -> CONTINUE
 */
export function decide(score: number, threshold: number, round: number, maxRounds: number): Decision {
  if (score >= threshold) {
    return {
      outcome: "STOP_ACCEPT",
      reason: `Score ${formatScore(score)} >= threshold ${formatScore(threshold)}`,
    };
  }
  if (round >= maxRounds) {
    return {
      outcome: "STOP_MAX_ROUNDS",
      reason: `ThresholdNeverMet: score ${formatScore(score)} < threshold ${formatScore(threshold)} after ${round}/${maxRounds} rounds`,
    };
  }
  return {
    outcome: "CONTINUE",
    reason: `Score ${formatScore(score)} < threshold ${formatScore(threshold)}; continuing to round ${pad2(round + 1)}`,
  };
}
