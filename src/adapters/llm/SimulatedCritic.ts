import { EvaluatorPort, type EvalResult, type EvaluationContext } from "../../core/ports/EvaluatorPort";
import type { AssetBatch, Delta, SubScores } from "../../core/types/Pack";
import { SYNTHETIC_PREFIX } from "../../core/gate/QualityGate";
import { titleCase } from "../../core/utils/format";

export const SIMULATED_MODEL = "simulated";
export const DEFAULT_SIMULATED_SCORE = 8.1;

type SimulatedCriticOptions = {
  /** Puntaje fijo, o uno por ronda (el último se repite). */
  score?: number | readonly number[] | undefined;
};

/**
 * Crítico offline para dry runs y tests. Todo rationale se marca como
 * sintético y el resultado nunca es autoritativo.
 */
export class SimulatedCritic extends EvaluatorPort {
  private readonly scores: readonly number[];

  constructor(opts: SimulatedCriticOptions = {}) {
    super();
    const s = opts.score ?? DEFAULT_SIMULATED_SCORE;
    this.scores = typeof s === "number" ? [s] : s.length ? s : [DEFAULT_SIMULATED_SCORE];
  }

  async evaluate(batch: AssetBatch, ctx: EvaluationContext, _signal: AbortSignal): Promise<EvalResult> {
    const score = this.scoreFor(ctx.round);
    const rationale = (dim: string) => `${SYNTHETIC_PREFIX} ${titleCase(dim)} not assessed (simulated score)`;
    const subScores: SubScores = {
      brand_consistency: { score, rationale: rationale("brand_consistency") },
      technical_quality: { score, rationale: rationale("technical_quality") },
      compliance: { score, rationale: rationale("compliance") },
      visual_appeal: { score, rationale: rationale("visual_appeal") },
    };

    const selections: Record<string, string> = {};
    for (const category of ctx.categories) {
      const first = batch.assets.find((a) => a.category === category);
      if (first) selections[category] = first.id;
    }

    const deltas: Delta[] = ctx.categories.map((category) => ({
      target: { kind: "prompt", category },
      action: "refine",
      directive: `${SYNTHETIC_PREFIX} placeholder refinement for round ${ctx.round + 1}`,
    }));

    return {
      overallScore: score,
      subScores,
      criticalIssues: [],
      selections,
      deltas,
      model: SIMULATED_MODEL,
      authoritative: false,
    };
  }

  private scoreFor(round: number): number {
    const idx = Math.min(round - 1, this.scores.length - 1);
    return this.scores[Math.max(0, idx)] ?? DEFAULT_SIMULATED_SCORE;
  }
}
