import { readFile } from "node:fs/promises";
import { z } from "zod";
import { EvaluatorPort, type EvalResult, type EvaluationContext } from "../../core/ports/EvaluatorPort";
import type { Asset, AssetBatch, Delta, SubScores } from "../../core/types/Pack";
import { DIMENSIONS, DELTA_ACTIONS } from "../../core/types/Pack";
import { isDeltaAction, parseDelta, parseTarget } from "../../core/refine/deltas";
import { RUBRIC, calculateOverallScore } from "../../core/rubric/rubric";
import { DEFAULT_GEMINI_BASE_URL, generateContent, type GeminiPart } from "./geminiHttp";
import { safeParseModelJSON } from "./modelJson";

export const DEFAULT_CRITIC_MODEL = "gemini-2.5-flash";
export const MAX_CRITIC_IMAGES = 12;

type GeminiCriticOptions = {
  apiKey: string;
  model?: string | undefined;
  baseUrl?: string | undefined;
  maxImages?: number | undefined;
  fetchImpl?: typeof fetch | undefined;
  readAsset?: ((path: string) => Promise<Buffer>) | undefined;
};

const SubScoreSchema = z.object({
  score: z.number(),
  rationale: z.string().default(""),
});

const DeltaObjectSchema = z.object({
  target: z.string(),
  action: z.string(),
  directive: z.string(),
});

const CriticReplySchema = z.object({
  overall_score: z.number().nullable().default(null),
  dimension_scores: z.object({
    brand_consistency: SubScoreSchema,
    technical_quality: SubScoreSchema,
    compliance: SubScoreSchema,
    visual_appeal: SubScoreSchema,
  }),
  critical_issues: z.array(z.string()).default([]),
  selected_assets: z.record(z.string()).default({}),
  deltas: z.array(z.union([z.string(), DeltaObjectSchema])).default([]),
});

type CriticReply = z.infer<typeof CriticReplySchema>;

/** Respuesta del modelo crítico que no se pudo convertir en resultado. */
export class CriticResponseError extends Error {
  constructor(message: string, readonly retryable: boolean) {
    super(message);
    this.name = "CriticResponseError";
  }
}

/**
 * Crítico visual con Gemini generateContent:
 * - Header x-goog-api-key (no ?key=)
 * - generationConfig.responseMimeType = application/json
 * - Hasta 12 imágenes inline, etiquetadas por id de asset
 * - Parser tolerante (fences, primer JSON balanceado) y luego validación con schema
 *
 * Sin fallback heurístico: si la llamada falla lanza error, y el gate reintenta
 * o marca la ronda como fallida.
 */
export class GeminiCritic extends EvaluatorPort {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly maxImages: number;
  private readonly fetchImpl: typeof fetch;
  private readonly readAsset: (path: string) => Promise<Buffer>;

  constructor(opts: GeminiCriticOptions) {
    super();
    this.apiKey = opts.apiKey.trim();
    if (!this.apiKey) throw new Error("[GeminiCritic] apiKey is required");
    this.model = (opts.model ?? DEFAULT_CRITIC_MODEL).trim();
    this.baseUrl = opts.baseUrl ?? DEFAULT_GEMINI_BASE_URL;
    this.maxImages = Math.min(opts.maxImages ?? MAX_CRITIC_IMAGES, MAX_CRITIC_IMAGES);
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.readAsset = opts.readAsset ?? ((path) => readFile(path));
  }

  async evaluate(batch: AssetBatch, ctx: EvaluationContext, signal: AbortSignal): Promise<EvalResult> {
    const shown = batch.assets.filter((a) => a.path !== null).slice(0, this.maxImages);
    if (shown.length < batch.assets.length) {
      console.warn(`[GeminiCritic] ${ctx.packName}: showing ${shown.length} of ${batch.assets.length} assets`);
    }

    const parts: Array<Record<string, unknown>> = [{ text: buildCriticPrompt(batch, ctx) }];
    for (const asset of shown) {
      parts.push({ text: `Asset ${asset.id} (${asset.category})` });
      parts.push({ inline_data: { mime_type: asset.mimeType, data: await this.encode(asset) } });
    }

    const reply = await generateContent({
      apiKey: this.apiKey,
      model: this.model,
      baseUrl: this.baseUrl,
      body: {
        contents: [{ parts }],
        generationConfig: { responseMimeType: "application/json", temperature: 0.2 },
      },
      signal,
      fetchImpl: this.fetchImpl,
    });

    return toEvalResult(parseCriticReply(reply), this.model, ctx);
  }

  private async encode(asset: Asset): Promise<string> {
    if (asset.path === null) throw new CriticResponseError(`asset ${asset.id} has no file`, false);
    const bytes = await this.readAsset(asset.path);
    return bytes.toString("base64");
  }
}

export function buildCriticPrompt(batch: AssetBatch, ctx: EvaluationContext): string {
  const b = batch.parameters.brand;
  const rubric = DIMENSIONS.map(
    (d) => `- ${d} (weight ${RUBRIC[d].weight}): ${RUBRIC[d].description}`
  );
  const assets = batch.assets.map((a) => `- ${a.id} (category ${a.category})`);

  return [
    `You are the quality critic for the Etsy digital asset pack "${ctx.packName}", round ${ctx.round}.`,
    `Theme: ${batch.parameters.theme}`,
    `Brand palette: ${[...b.primary_colors, ...b.secondary_colors].join(", ")}`,
    `Texture: ${b.texture}. Composition: ${b.composition}. Lighting: ${b.lighting}. Mood: ${b.mood}.`,
    "",
    "Score every dimension from 0 to 10:",
    ...rubric,
    "",
    "Candidate assets:",
    ...assets,
    "",
    `Select exactly one asset id for each category: ${ctx.categories.join(", ")}.`,
    `Suggest deltas for the next round as objects {target, action, directive}; target is "prompts.<category>" or "brand.<token>", action one of ${DELTA_ACTIONS.join(", ")}.`,
    "List critical issues (trademarks, illegible text, artifacts) as short strings.",
    "Reply ONLY with JSON: {overall_score, dimension_scores: {<dimension>: {score, rationale}}, critical_issues, selected_assets: {<category>: <asset id>}, deltas}.",
  ].join("\n");
}

function parseCriticReply(parts: GeminiPart[]): CriticReply {
  const text = parts.map((p) => p.text ?? "").join("").trim();
  const parsed = CriticReplySchema.safeParse(safeParseModelJSON(text));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unreadable reply";
    throw new CriticResponseError(`critic reply rejected (${where})`, true);
  }
  return parsed.data;
}

function toEvalResult(reply: CriticReply, model: string, ctx: EvaluationContext): EvalResult {
  const d = reply.dimension_scores;
  const subScores: SubScores = {
    brand_consistency: d.brand_consistency,
    technical_quality: d.technical_quality,
    compliance: d.compliance,
    visual_appeal: d.visual_appeal,
  };

  const deltas: Delta[] = [];
  for (const raw of reply.deltas) {
    const delta = typeof raw === "string" ? parseDelta(raw) : objectDelta(raw);
    if (delta) deltas.push(delta);
    else console.warn(`[GeminiCritic] ${ctx.packName}: ignoring delta ${JSON.stringify(raw)}`);
  }

  return {
    overallScore: reply.overall_score ?? calculateOverallScore(subScores),
    subScores,
    criticalIssues: reply.critical_issues.map((s) => s.trim()).filter(Boolean),
    selections: { ...reply.selected_assets },
    deltas,
    model,
    authoritative: true,
  };
}

function objectDelta(raw: z.infer<typeof DeltaObjectSchema>): Delta | null {
  const target = parseTarget(raw.target);
  const action = raw.action.trim().toLowerCase();
  const directive = raw.directive.trim();
  if (!target || !isDeltaAction(action) || !directive) return null;
  return { target, action, directive };
}
