export const DIMENSIONS = [
  "brand_consistency",
  "technical_quality",
  "compliance",
  "visual_appeal",
] as const;

export type Dimension = (typeof DIMENSIONS)[number];

export interface SubScore {
  score: number;      // 0..10
  rationale: string;
}

export type SubScores = Record<Dimension, SubScore>;

export const DELTA_ACTIONS = ["enhance", "refine", "adjust", "simplify", "strengthen", "vary"] as const;

export type DeltaAction = (typeof DELTA_ACTIONS)[number];

export type DeltaTarget =
  | { kind: "prompt"; category: string }
  | { kind: "brand"; token: BrandTokenName };

export interface Delta {
  target: DeltaTarget;
  action: DeltaAction;
  directive: string;
}

export type DecisionOutcome = "CONTINUE" | "STOP_ACCEPT" | "STOP_MAX_ROUNDS";

export interface Decision {
  outcome: DecisionOutcome;
  reason: string;
}

export interface EvaluatorIdentity {
  model: string;
  authoritative: boolean;
}

export interface EvaluationRound {
  readonly packName: string;
  readonly round: number;
  readonly startedAt: string;   // ISO
  readonly finishedAt: string;  // ISO
  readonly runtimeMs: number;
  readonly overallScore: number;
  readonly subScores: Readonly<SubScores>;
  readonly criticalIssues: readonly string[];
  readonly selections: Readonly<Record<string, string>>;
  readonly deltas: readonly Delta[];
  readonly decision: Decision;
  readonly evaluator: EvaluatorIdentity;
  /** Parámetros que generaron el lote evaluado; la ronda siguiente parte de ellos. */
  readonly parameters: GenerationParameters;
}

export type TerminalStatus = "ACCEPT" | "MAX_ROUNDS" | "FAILED";
export type PackStatus = "ACTIVE" | TerminalStatus;

export type GateErrorCode =
  | "EvaluationFailed"
  | "IncompleteSelection"
  | "TimeoutExceeded"
  | "RegenerationFailed"
  | "Aborted";

export interface GateFailure {
  code: GateErrorCode;
  message: string;
  round: number;
}

export interface PackOutcome {
  packName: string;
  status: TerminalStatus;
  finalRound: number;
  reason: string;
  failure: GateFailure | null;
  rounds: readonly EvaluationRound[];
  closedAt: string;
}

/* ---------- assets ---------- */

export const BRAND_TEXT_TOKENS = ["texture", "composition", "lighting", "mood"] as const;
export type BrandTextToken = (typeof BRAND_TEXT_TOKENS)[number];
export const BRAND_TOKEN_NAMES = [...BRAND_TEXT_TOKENS, "primary_colors", "secondary_colors"] as const;
export type BrandTokenName = (typeof BRAND_TOKEN_NAMES)[number];

export interface BrandTokens {
  primary_colors: string[];
  secondary_colors: string[];
  texture: string;
  composition: string;
  lighting: string;
  mood: string;
}

export interface GenerationParameters {
  theme: string;
  prompts: Record<string, string>;  // categoría -> prompt
  brand: BrandTokens;
}

export interface Asset {
  id: string;
  category: string;
  path: string | null;    // null si el asset solo existe virtualmente (modo simulado)
  mimeType: string;
}

export interface AssetBatch {
  round: number;
  assets: Asset[];
  parameters: GenerationParameters;
}
