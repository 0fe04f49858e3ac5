import type { Client, Row } from "@libsql/client";
import { z } from "zod";
import type { OpenPackInput, PackRepoPort, PackRow, PackSnapshot } from "../../core/ports/PackRepoPort";
import { BRAND_TOKEN_NAMES, DELTA_ACTIONS, type EvaluationRound, type PackOutcome } from "../../core/types/Pack";
import { freezeRound } from "../../core/gate/PackRecord";
import { migrateOnce } from "../../db/migrate";

const SubScoreSchema = z.object({ score: z.number(), rationale: z.string() });
const SubScoresSchema = z.object({
  brand_consistency: SubScoreSchema,
  technical_quality: SubScoreSchema,
  compliance: SubScoreSchema,
  visual_appeal: SubScoreSchema,
});
const DeltaSchema = z.object({
  target: z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("prompt"), category: z.string() }),
    z.object({
      kind: z.literal("brand"),
      token: z.enum(BRAND_TOKEN_NAMES),
    }),
  ]),
  action: z.enum(DELTA_ACTIONS),
  directive: z.string(),
});
const ParametersSchema = z.object({
  theme: z.string(),
  prompts: z.record(z.string()),
  brand: z.object({
    primary_colors: z.array(z.string()),
    secondary_colors: z.array(z.string()),
    texture: z.string(),
    composition: z.string(),
    lighting: z.string(),
    mood: z.string(),
  }),
});
const PackStatusSchema = z.enum(["ACTIVE", "ACCEPT", "MAX_ROUNDS", "FAILED"]);
const OutcomeSchema = z.enum(["CONTINUE", "STOP_ACCEPT", "STOP_MAX_ROUNDS"]);

/** Persistencia de packs y rondas con @libsql/client (archivo local o Turso). */
export class LibsqlPackRepo implements PackRepoPort {
  constructor(private readonly db: Client) {}

  async openPack(input: OpenPackInput): Promise<PackSnapshot> {
    await migrateOnce(this.db);
    await this.db.execute({
      sql: `INSERT INTO qa_packs (name, categories, threshold, max_rounds, started_at)
            VALUES (?, ?, ?, ?, ?)
            ON CONFLICT(name) DO NOTHING`,
      args: [input.name, JSON.stringify(input.categories), input.threshold, input.max_rounds, input.started_at],
    });
    const snapshot = await this.getPack(input.name);
    if (!snapshot) throw new Error(`[LibsqlPackRepo] pack "${input.name}" missing after insert`);
    return snapshot;
  }

  async getPack(name: string): Promise<PackSnapshot | null> {
    await migrateOnce(this.db);
    const packs = await this.db.execute({ sql: `SELECT * FROM qa_packs WHERE name = ? LIMIT 1`, args: [name] });
    const row = packs.rows[0];
    if (!row) return null;

    const rounds = await this.db.execute({
      sql: `SELECT * FROM qa_rounds WHERE pack_name = ? ORDER BY round ASC`,
      args: [name],
    });
    return { pack: toPackRow(row), rounds: rounds.rows.map(toRound) };
  }

  async appendRound(r: EvaluationRound): Promise<void> {
    await migrateOnce(this.db);
    // la contigüidad y el chequeo de ACTIVE van en la propia sentencia
    const res = await this.db.execute({
      sql: `INSERT INTO qa_rounds (pack_name, round, started_at, finished_at, runtime_ms, overall_score,
              sub_scores, critical, selections, deltas, decision, reason, model, authoritative, parameters)
            SELECT ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?
            WHERE EXISTS (SELECT 1 FROM qa_packs WHERE name = ? AND status = 'ACTIVE')
              AND (SELECT COALESCE(MAX(round), 0) FROM qa_rounds WHERE pack_name = ?) = ?`,
      args: [
        r.packName,
        r.round,
        r.startedAt,
        r.finishedAt,
        r.runtimeMs,
        r.overallScore,
        JSON.stringify(r.subScores),
        JSON.stringify(r.criticalIssues),
        JSON.stringify(r.selections),
        JSON.stringify(r.deltas),
        r.decision.outcome,
        r.decision.reason,
        r.evaluator.model,
        r.evaluator.authoritative ? 1 : 0,
        JSON.stringify(r.parameters),
        r.packName,
        r.packName,
        r.round - 1,
      ],
    });
    if (res.rowsAffected === 0) {
      throw new Error(`[LibsqlPackRepo] round ${r.round} of "${r.packName}" rejected (pack closed or round not next)`);
    }
  }

  async closePack(o: PackOutcome): Promise<boolean> {
    await migrateOnce(this.db);
    const res = await this.db.execute({
      sql: `UPDATE qa_packs
            SET status = ?, reason = ?, failure_code = ?, failure_message = ?, failed_round = ?, closed_at = ?
            WHERE name = ? AND status = 'ACTIVE'`,
      args: [
        o.status,
        o.reason,
        o.failure?.code ?? null,
        o.failure?.message ?? null,
        o.failure?.round ?? null,
        o.closedAt,
        o.packName,
      ],
    });
    return res.rowsAffected > 0;
  }
}

function toPackRow(r: Row): PackRow {
  return {
    name: String(r.name),
    categories: z.array(z.string()).parse(JSON.parse(String(r.categories))),
    threshold: Number(r.threshold),
    max_rounds: Number(r.max_rounds),
    status: PackStatusSchema.parse(r.status),
    reason: nullableString(r.reason),
    failure_code: nullableString(r.failure_code),
    failure_message: nullableString(r.failure_message),
    failed_round: r.failed_round == null ? null : Number(r.failed_round),
    started_at: String(r.started_at),
    closed_at: nullableString(r.closed_at),
  };
}

function toRound(r: Row): EvaluationRound {
  return freezeRound({
    packName: String(r.pack_name),
    round: Number(r.round),
    startedAt: String(r.started_at),
    finishedAt: String(r.finished_at),
    runtimeMs: Number(r.runtime_ms),
    overallScore: Number(r.overall_score),
    subScores: SubScoresSchema.parse(JSON.parse(String(r.sub_scores))),
    criticalIssues: z.array(z.string()).parse(JSON.parse(String(r.critical))),
    selections: z.record(z.string()).parse(JSON.parse(String(r.selections))),
    deltas: z.array(DeltaSchema).parse(JSON.parse(String(r.deltas))),
    decision: { outcome: OutcomeSchema.parse(r.decision), reason: String(r.reason) },
    evaluator: { model: String(r.model), authoritative: Number(r.authoritative) === 1 },
    parameters: ParametersSchema.parse(JSON.parse(String(r.parameters))),
  });
}

function nullableString(v: unknown): string | null {
  return v == null ? null : String(v);
}
