import type { PackSnapshot } from "../ports/PackRepoPort";
import { DIMENSIONS, type EvaluationRound, type PackOutcome } from "../types/Pack";
import { formatDelta } from "../refine/deltas";
import { scoreTrend } from "../rubric/rubric";
import { formatRuntime } from "../utils/dates";
import { formatScore, pad2, titleCase } from "../utils/format";

const DECISION_LABEL = {
  CONTINUE: "CONTINUE",
  STOP_ACCEPT: "STOP-ACCEPT",
  STOP_MAX_ROUNDS: "STOP-MAX-ROUNDS",
} as const;

/** Reporte Markdown de una ronda, secciones en orden fijo. */
export function renderRoundReport(r: EvaluationRound): string {
  const lines: string[] = [
    `# Round ${pad2(r.round)} - Quality Assurance Report`,
    "",
    `**Pack:** ${r.packName}`,
    `**Evaluator:** ${r.evaluator.model}${r.evaluator.authoritative ? "" : " (simulated, non-authoritative)"}`,
    "",
    "## Overall Score",
    "",
    `${formatScore(r.overallScore)}/10`,
    "",
    "## Dimension Scores",
    "",
  ];

  for (const dim of DIMENSIONS) {
    const s = r.subScores[dim];
    lines.push(`- **${titleCase(dim)}:** ${formatScore(s.score)}/10 - ${s.rationale}`);
  }

  lines.push("", "## Critical Issues", "");
  if (r.criticalIssues.length) {
    for (const issue of r.criticalIssues) lines.push(`- ${issue}`);
  } else {
    lines.push("None");
  }

  lines.push("", "## Selected Assets", "");
  for (const [category, asset] of Object.entries(r.selections)) {
    lines.push(`- ${category}: ${asset}`);
  }

  lines.push("", "## Deltas for Next Round", "");
  if (r.deltas.length) {
    r.deltas.forEach((d, i) => lines.push(`${i + 1}. ${formatDelta(d)}`));
  } else {
    lines.push("(No improvements suggested)");
  }

  lines.push(
    "",
    "## Decision",
    "",
    `**Decision:** ${DECISION_LABEL[r.decision.outcome]}`,
    `**Reason:** ${r.decision.reason}`,
    "",
    "## Timing",
    "",
    `**Started:** ${r.startedAt}`,
    `**Finished:** ${r.finishedAt}`,
    `**Runtime:** ${formatRuntime(r.runtimeMs)}`
  );

  return lines.join("\n") + "\n";
}

/** Resumen Markdown con la tabla de evolución de puntajes y el resultado final. */
export function renderSummary(o: PackOutcome): string {
  const lines: string[] = [
    "# Multi-Round Evaluation Summary",
    "",
    `**Pack:** ${o.packName}`,
    `**Total Rounds:** ${o.rounds.length}`,
    `**Closed:** ${o.closedAt}`,
    "",
    "## Score Progression",
    "",
  ];

  if (o.rounds.length) {
    lines.push(
      "| Round | Overall | Brand | Technical | Compliance | Visual | Decision |",
      "|-------|---------|-------|-----------|------------|--------|----------|"
    );
    for (const r of o.rounds) {
      const s = r.subScores;
      lines.push(
        `| ${pad2(r.round)} | ${r.overallScore.toFixed(1)} | ${s.brand_consistency.score.toFixed(1)} | ` +
          `${s.technical_quality.score.toFixed(1)} | ${s.compliance.score.toFixed(1)} | ` +
          `${s.visual_appeal.score.toFixed(1)} | ${DECISION_LABEL[r.decision.outcome]} |`
      );
    }
  } else {
    lines.push("(No rounds recorded)");
  }

  lines.push("", "## Final Result", "", `**Status:** ${o.status}`, `**Reason:** ${o.reason}`);
  if (o.failure) {
    lines.push(`**Failed Round:** ${pad2(o.failure.round)} (${o.failure.code})`);
  }
  const total = o.rounds.reduce((acc, r) => acc + r.runtimeMs, 0);
  lines.push("", "---", `**Total Runtime:** ${formatRuntime(total)}`);

  return lines.join("\n") + "\n";
}

/** Mensaje corto en texto plano para el canal del operador. */
export function renderOperatorMessage(o: PackOutcome): string {
  const lines = [
    `Pack "${o.packName}": ${o.status} at round ${pad2(o.finalRound)}`,
    `Reason: ${o.reason}`,
  ];
  if (o.rounds.length) lines.push(`Scores: ${scoreTrend(o.rounds.map((r) => r.overallScore))}`);
  for (const r of o.rounds) {
    lines.push(`- round ${pad2(r.round)}: ${formatScore(r.overallScore)} ${DECISION_LABEL[r.decision.outcome]}`);
  }
  return lines.join("\n");
}

/** Historial del pack en texto plano para la CLI. */
export function renderHistory({ pack, rounds }: PackSnapshot): string {
  const lines = [
    `Pack: ${pack.name}`,
    `Status: ${pack.status}${pack.reason ? ` (${pack.reason})` : ""}`,
    `Categories: ${pack.categories.join(", ")}`,
    `Threshold: ${formatScore(pack.threshold)}  Max rounds: ${pack.max_rounds}`,
  ];
  if (rounds.length) lines.push(`Scores: ${scoreTrend(rounds.map((r) => r.overallScore))}`);
  for (const r of rounds) {
    const flag = r.evaluator.authoritative ? "" : " [simulated]";
    lines.push(`  round ${pad2(r.round)}: ${formatScore(r.overallScore)} ${DECISION_LABEL[r.decision.outcome]}${flag}`);
  }
  if (pack.failure_code) {
    lines.push(`Failed at round ${pad2(pack.failed_round ?? 0)}: ${pack.failure_code}`);
  }
  return lines.join("\n");
}
