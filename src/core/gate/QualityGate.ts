import type { EvaluatorPort, EvalResult } from "../ports/EvaluatorPort";
import type { RegeneratorPort } from "../ports/RegeneratorPort";
import type { NotifierPort } from "../ports/NotifierPort";
import type { PackRepoPort } from "../ports/PackRepoPort";
import type { ReportWriterPort } from "../ports/ReportWriterPort";
import type {
  AssetBatch,
  Dimension,
  EvaluationRound,
  GateFailure,
  PackOutcome,
  SubScore,
  SubScores,
  TerminalStatus,
} from "../types/Pack";
import { validateGateConfig, type GateConfig } from "./config";
import { decide } from "./decision";
import { ConfigError, GateError, PackClosedError, errorMessage } from "./errors";
import { PackRecord } from "./PackRecord";
import { throwIfAborted, withRetry } from "./retry";
import { describeState, initialState, transition, type GateEvent, type GateState } from "./stateMachine";
import { isScore } from "../rubric/rubric";
import { renderOperatorMessage } from "../report/qaLog";
import { elapsedMs, systemClock, type Clock } from "../utils/dates";
import { formatScore, pad2 } from "../utils/format";

export const SYNTHETIC_PREFIX = "[SIMULATED]";

export type QualityGateOptions = {
  reports?: ReportWriterPort;
  /** Destinatario de la notificación al cerrar el pack. */
  operator?: string;
  clock?: Clock;
  /** Se invoca en cada transición de estado, en orden. */
  observer?: (state: GateState) => void;
};

export type GateRunOptions = {
  /** Lote a evaluar en la ronda 1; si falta, lo genera el regenerador. */
  initialBatch?: AssetBatch | undefined;
  signal?: AbortSignal | undefined;
};

/**
 * Bucle iterativo de aceptación/rechazo de un pack:
 * evaluar -> validar -> decidir -> registrar -> cerrar o regenerar.
 * Las rondas de un pack son estrictamente secuenciales; gates distintos no comparten estado.
 */
export class QualityGate {
  private readonly clock: Clock;

  constructor(
    private readonly repo: PackRepoPort,
    private readonly evaluator: EvaluatorPort,
    private readonly regenerator: RegeneratorPort,
    private readonly notifier: NotifierPort,
    private readonly opts: QualityGateOptions = {}
  ) {
    this.clock = opts.clock ?? systemClock;
  }

  async run(packName: string, config: GateConfig, runOpts: GateRunOptions = {}): Promise<PackOutcome> {
    const { record, cfg } = await this.openRecord(packName, validateGateConfig(config));

    // hay una decisión de cierre registrada pero el pack nunca se cerró
    const last = record.lastRound;
    if (last && last.decision.outcome !== "CONTINUE") {
      const status: TerminalStatus = last.decision.outcome === "STOP_ACCEPT" ? "ACCEPT" : "MAX_ROUNDS";
      console.warn(`[QualityGate] "${packName}" round ${pad2(last.round)} already decided ${last.decision.outcome}; closing the pack`);
      this.emit({ kind: "TERMINAL", round: last.round, status });
      return this.finish(record, status, last.decision.reason, null);
    }
    if (record.rounds.length >= cfg.maxRounds) {
      throw new ConfigError(`pack "${packName}" already has ${record.rounds.length} rounds; maxRounds ${cfg.maxRounds} leaves none to run`);
    }

    let state = initialState(record.nextRound);
    this.emit(state);
    if (last) {
      console.log(`[QualityGate] Resuming "${packName}" at round ${pad2(state.round)}`);
    } else {
      console.log(`[QualityGate] Starting "${packName}" (threshold ${formatScore(cfg.threshold)}, max ${cfg.maxRounds} rounds)`);
    }

    // los assets anteriores no se recargan; los parámetros guardados conservan los ajustes
    let previous: AssetBatch | null = last ? { round: last.round, assets: [], parameters: last.parameters } : null;
    let batch: AssetBatch | null = last ? null : runOpts.initialBatch ?? null;

    for (;;) {
      const round = state.round;
      const startedAt = this.clock();
      const label = `${packName} round ${pad2(round)}`;
      let result: EvalResult;
      let scored: AssetBatch;

      try {
        if (!batch) {
          const req = { packName, round, previous, deltas: record.lastRound?.deltas ?? [] };
          batch = await withRetry((signal) => this.regenerator.regenerate(req, signal), {
            label: `regenerate ${label}`,
            failureCode: "RegenerationFailed",
            timeoutMs: cfg.callTimeoutMs,
            retries: cfg.retries,
            backoffMs: cfg.backoffMs,
            signal: runOpts.signal,
          });
        }
        const candidate = batch;
        const ctx = { packName, round, categories: cfg.categories };
        const raw = await withRetry((signal) => this.evaluator.evaluate(candidate, ctx, signal), {
          label: `evaluate ${label}`,
          failureCode: "EvaluationFailed",
          timeoutMs: cfg.callTimeoutMs,
          retries: cfg.retries,
          backoffMs: cfg.backoffMs,
          signal: runOpts.signal,
        });
        result = validateResult(raw, candidate, cfg.categories);
        throwIfAborted(runOpts.signal, `evaluate ${label}`);
        scored = candidate;
      } catch (e) {
        state = this.step(state, { type: "FAILED" });
        const failure: GateFailure = {
          code: e instanceof GateError ? e.code : "EvaluationFailed",
          message: errorMessage(e),
          round,
        };
        console.error(`[QualityGate] ${label} failed (${failure.code}): ${failure.message}`);
        return this.finish(record, "FAILED", `${failure.code}: ${failure.message}`, failure);
      }

      state = this.step(state, { type: "SCORED" });
      const decision = decide(result.overallScore, cfg.threshold, round, cfg.maxRounds);
      const finishedAt = this.clock();

      const evaluation = record.append({
        packName,
        round,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        runtimeMs: elapsedMs(startedAt, finishedAt),
        overallScore: result.overallScore,
        subScores: result.subScores,
        criticalIssues: result.criticalIssues,
        selections: result.selections,
        deltas: result.deltas,
        decision,
        evaluator: { model: result.model, authoritative: result.authoritative },
        parameters: scored.parameters,
      });
      await this.repo.appendRound(evaluation);
      await this.writeReport(evaluation);

      console.log(`[QualityGate] ${label}: score ${formatScore(result.overallScore)} -> ${decision.outcome} (${decision.reason})`);
      if (evaluation.criticalIssues.length) {
        console.warn(`[QualityGate] ${label} critical issues: ${evaluation.criticalIssues.join("; ")}`);
      }

      state = this.step(state, { type: "DECIDED", outcome: decision.outcome });
      if (state.kind === "TERMINAL") {
        return this.finish(record, state.status, decision.reason, null);
      }

      previous = scored;
      batch = null;
      state = this.step(state, { type: "ADVANCE" });
    }
  }

  /**
   * Abre o recarga el pack. Umbral y máximo de rondas son los de su creación;
   * si se piden otros, se loguea y se ignoran.
   */
  private async openRecord(packName: string, requested: GateConfig): Promise<{ record: PackRecord; cfg: GateConfig }> {
    const { pack, rounds } = await this.repo.openPack({
      name: packName,
      categories: requested.categories,
      threshold: requested.threshold,
      max_rounds: requested.maxRounds,
      started_at: this.clock().toISOString(),
    });
    if (pack.status !== "ACTIVE") throw new PackClosedError(packName, pack.status);

    const stored = [...pack.categories].sort().join(",");
    if (stored !== [...requested.categories].sort().join(",")) {
      throw new ConfigError(`pack "${packName}" was created with categories [${pack.categories.join(", ")}]`);
    }
    if (pack.threshold !== requested.threshold || pack.max_rounds !== requested.maxRounds) {
      console.warn(
        `[QualityGate] "${packName}" keeps threshold ${formatScore(pack.threshold)} and max ${pack.max_rounds} rounds from its creation ` +
          `(requested ${formatScore(requested.threshold)}, ${requested.maxRounds})`
      );
    }

    const cfg: GateConfig = { ...requested, threshold: pack.threshold, maxRounds: pack.max_rounds };
    return { record: new PackRecord(packName, pack.categories, rounds), cfg };
  }

  private async finish(
    record: PackRecord,
    status: TerminalStatus,
    reason: string,
    failure: GateFailure | null
  ): Promise<PackOutcome> {
    record.close(status);
    const outcome: PackOutcome = {
      packName: record.name,
      status,
      finalRound: failure ? failure.round : record.rounds.length,
      reason,
      failure,
      rounds: record.rounds,
      closedAt: this.clock().toISOString(),
    };

    const closed = await this.repo.closePack(outcome);
    if (!closed) console.warn(`[QualityGate] Pack "${record.name}" was already closed in the repository`);

    if (this.opts.reports) {
      try {
        await this.opts.reports.writeSummary(outcome);
      } catch (e) {
        console.error(`[QualityGate] Summary report for "${record.name}" not written:`, errorMessage(e));
      }
    }
    await safeNotify(this.notifier, this.opts.operator ?? "operator", renderOperatorMessage(outcome));

    console.log(`[QualityGate] "${record.name}" finished ${status} at round ${pad2(outcome.finalRound)}: ${reason}`);
    return outcome;
  }

  private async writeReport(round: EvaluationRound): Promise<void> {
    if (!this.opts.reports) return;
    try {
      await this.opts.reports.writeRound(round);
    } catch (e) {
      console.error(`[QualityGate] Report for ${round.packName} round ${pad2(round.round)} not written:`, errorMessage(e));
    }
  }

  private step(state: GateState, event: GateEvent): GateState {
    const next = transition(state, event);
    this.emit(next);
    return next;
  }

  private emit(state: GateState): void {
    this.opts.observer?.(state);
    if (process.env.QA_DEBUG) console.log(`[QualityGate] state ${describeState(state)}`);
  }
}

/**
 * Valida el resultado del evaluador: rangos de puntaje y categorías requeridas.
 * En resultados sintéticos marca el rationale si el evaluador no lo hizo.
 */
export function validateResult(result: EvalResult, batch: AssetBatch, categories: readonly string[]): EvalResult {
  if (!isScore(result.overallScore)) {
    throw new GateError("EvaluationFailed", `overall score out of bounds: ${String(result.overallScore)}`);
  }

  const subScores: SubScores = {
    brand_consistency: checkSubScore(result, "brand_consistency"),
    technical_quality: checkSubScore(result, "technical_quality"),
    compliance: checkSubScore(result, "compliance"),
    visual_appeal: checkSubScore(result, "visual_appeal"),
  };

  const missing = categories.filter((c) => !result.selections[c]);
  const unknown = Object.keys(result.selections).filter((c) => !categories.includes(c));
  if (missing.length || unknown.length) {
    const parts = [
      missing.length ? `missing [${missing.join(", ")}]` : "",
      unknown.length ? `unexpected [${unknown.join(", ")}]` : "",
    ].filter(Boolean);
    throw new GateError("IncompleteSelection", `selection ${parts.join(", ")}`);
  }

  const selections: Record<string, string> = {};
  for (const category of categories) {
    const id = result.selections[category] ?? "";
    const asset = batch.assets.find((a) => a.id === id);
    if (!asset || asset.category !== category) {
      throw new GateError("IncompleteSelection", `selection for ${category} names an asset not in the ${category} batch: ${id}`);
    }
    selections[category] = id;
  }

  return {
    ...result,
    subScores,
    selections,
    criticalIssues: [...result.criticalIssues],
    deltas: [...result.deltas],
  };
}

function checkSubScore(result: EvalResult, dim: Dimension): SubScore {
  const sub: SubScore | undefined = result.subScores[dim];
  if (!sub || !isScore(sub.score)) {
    throw new GateError("EvaluationFailed", `sub-score ${dim} missing or out of bounds`);
  }
  const rationale = sub.rationale.trim();
  const flagged = result.authoritative || rationale.startsWith(SYNTHETIC_PREFIX);
  return { score: sub.score, rationale: flagged ? rationale : `${SYNTHETIC_PREFIX} ${rationale}` };
}

async function safeNotify(notifier: NotifierPort, recipient: string, text: string): Promise<void> {
  try {
    await notifier.sendText(recipient, text);
  } catch (e) {
    console.error("[QualityGate] Error sending operator notification:", { recipient, err: errorMessage(e) });
  }
}
