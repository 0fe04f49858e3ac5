import type { EvaluationRound, PackOutcome } from "../types/Pack";

/** Copia legible (solo append) de las rondas de un pack. */
export interface ReportWriterPort {
  writeRound(round: EvaluationRound): Promise<void>;
  writeSummary(outcome: PackOutcome): Promise<void>;
}
