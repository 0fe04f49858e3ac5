import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ReportWriterPort } from "../../core/ports/ReportWriterPort";
import type { EvaluationRound, PackOutcome } from "../../core/types/Pack";
import { renderRoundReport, renderSummary } from "../../core/report/qaLog";
import { pad2 } from "../../core/utils/format";

/**
 * Escribe packs/<pack>/qa/round<NN>.md y qa/summary.md. Los reportes de ronda
 * se crean en modo exclusivo ('wx'): nunca se sobrescribe uno existente.
 */
export class MarkdownReportWriter implements ReportWriterPort {
  constructor(private readonly packsRoot: string) {}

  qaDir(packName: string): string {
    return join(this.packsRoot, packName, "qa");
  }

  async writeRound(round: EvaluationRound): Promise<void> {
    const dir = this.qaDir(round.packName);
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, `round${pad2(round.round)}.md`), renderRoundReport(round), { flag: "wx" });
  }

  async writeSummary(outcome: PackOutcome): Promise<void> {
    const dir = this.qaDir(outcome.packName);
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, "summary.md"), renderSummary(outcome), { flag: "wx" });
  }
}
