import { EvaluatorPort, type EvalResult, type EvaluationContext } from '../../ports/EvaluatorPort';
import { NotifierPort } from '../../ports/NotifierPort';
import { RegeneratorPort, type RegenerateRequest } from '../../ports/RegeneratorPort';
import type { ReportWriterPort } from '../../ports/ReportWriterPort';
import type { AssetBatch, EvaluationRound, GenerationParameters, PackOutcome } from '../../types/Pack';
import type { GateConfig } from '../config';
import type { Clock } from '../../utils/dates';

export const CATEGORIES = ['starting', 'brb'];

export const PARAMS: GenerationParameters = {
  theme: 'neon city',
  prompts: {
    starting: 'Starting soon screen, {theme}',
    brb: 'Be right back screen, {theme}',
  },
  brand: {
    primary_colors: ['#FF00FF'],
    secondary_colors: ['#1A1A2E'],
    texture: 'wet glass',
    composition: 'rule of thirds',
    lighting: 'neon glow',
    mood: 'energetic',
  },
};

export function gateConfig(overrides: Partial<GateConfig> = {}): GateConfig {
  return {
    threshold: 8.5,
    maxRounds: 5,
    categories: [...CATEGORIES],
    callTimeoutMs: 1000,
    retries: 1,
    backoffMs: 1,
    ...overrides,
  };
}

export function batchFor(round: number): AssetBatch {
  return {
    round,
    parameters: PARAMS,
    assets: CATEGORIES.flatMap((category) => [
      { id: `${category}_a`, category, path: null, mimeType: 'image/png' },
      { id: `${category}_b`, category, path: null, mimeType: 'image/png' },
    ]),
  };
}

export function resultFor(batch: AssetBatch, ctx: EvaluationContext, score: number): EvalResult {
  const selections: Record<string, string> = {};
  for (const category of ctx.categories) {
    const asset = batch.assets.find((a) => a.category === category);
    if (asset) selections[category] = asset.id;
  }
  const sub = { score, rationale: 'looks fine' };
  return {
    overallScore: score,
    subScores: { brand_consistency: sub, technical_quality: sub, compliance: sub, visual_appeal: sub },
    criticalIssues: [],
    selections,
    deltas: [{ target: { kind: 'prompt', category: 'starting' }, action: 'enhance', directive: 'brighter glow' }],
    model: 'test-critic',
    authoritative: true,
  };
}

type Step = number | Error | 'hang';

/** Each call consumes the next step; the last step repeats. */
export class ScriptedCritic extends EvaluatorPort {
  readonly calls: number[] = [];

  constructor(private readonly steps: readonly Step[]) {
    super();
  }

  async evaluate(batch: AssetBatch, ctx: EvaluationContext, signal: AbortSignal): Promise<EvalResult> {
    const step = this.steps[Math.min(this.calls.length, this.steps.length - 1)];
    this.calls.push(ctx.round);
    if (step === undefined) throw new Error('empty script');
    if (step instanceof Error) throw step;
    if (step === 'hang') {
      return new Promise<EvalResult>((_, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      });
    }
    return resultFor(batch, ctx, step);
  }
}

export class RecordingRegenerator extends RegeneratorPort {
  readonly requests: RegenerateRequest[] = [];

  async regenerate(req: RegenerateRequest): Promise<AssetBatch> {
    this.requests.push(req);
    return batchFor(req.round);
  }
}

export class RecordingNotifier extends NotifierPort {
  readonly sent: Array<{ recipient: string; text: string }> = [];

  async sendText(recipient: string, text: string): Promise<void> {
    this.sent.push({ recipient, text });
  }
}

export class RecordingReports implements ReportWriterPort {
  readonly rounds: EvaluationRound[] = [];
  readonly summaries: PackOutcome[] = [];

  async writeRound(round: EvaluationRound): Promise<void> {
    this.rounds.push(round);
  }

  async writeSummary(outcome: PackOutcome): Promise<void> {
    this.summaries.push(outcome);
  }
}

/** Starts at 2025-01-01T00:00:00Z and advances one second per reading. */
export function steppingClock(): Clock {
  let t = Date.UTC(2025, 0, 1);
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}

export function roundFixture(round: number, score: number, packName = 'neon'): EvaluationRound {
  return {
    packName,
    round,
    startedAt: '2025-01-01T00:00:00.000Z',
    finishedAt: '2025-01-01T00:01:05.000Z',
    runtimeMs: 65_000,
    overallScore: score,
    subScores: {
      brand_consistency: { score, rationale: 'palette matches' },
      technical_quality: { score, rationale: 'sharp' },
      compliance: { score, rationale: 'no logos' },
      visual_appeal: { score, rationale: 'clear focal point' },
    },
    criticalIssues: [],
    selections: { starting: 'starting_a', brb: 'brb_a' },
    deltas: [{ target: { kind: 'prompt', category: 'brb' }, action: 'refine', directive: 'softer signs' }],
    decision: { outcome: 'CONTINUE', reason: `Score ${score} < threshold 8.5; continuing to round ${String(round + 1).padStart(2, '0')}` },
    evaluator: { model: 'test-critic', authoritative: true },
    parameters: PARAMS,
  };
}
