import type { AssetBatch, Delta, SubScores } from "../types/Pack";

export interface EvaluationContext {
  packName: string;
  round: number;
  categories: readonly string[];
}

export interface EvalResult {
  overallScore: number;                 // 0..10
  subScores: SubScores;
  criticalIssues: string[];
  selections: Record<string, string>;   // categoría -> id de asset
  deltas: Delta[];
  model: string;                        // id del modelo o "simulated"
  authoritative: boolean;               // false: sintético, nunca una evaluación real
}

/**
 * Evalúa un lote candidato. Las implementaciones lanzan error si no pueden dar
 * un resultado real; nunca inventan un puntaje aprobatorio.
 */
export abstract class EvaluatorPort {
  abstract evaluate(batch: AssetBatch, ctx: EvaluationContext, signal: AbortSignal): Promise<EvalResult>;
}
