import type { EvaluationRound, PackOutcome, PackStatus } from "../types/Pack";

export type PackRow = {
  name: string;
  categories: string[];
  threshold: number;
  max_rounds: number;
  status: PackStatus;
  reason: string | null;
  failure_code: string | null;
  failure_message: string | null;
  failed_round: number | null;
  started_at: string;
  closed_at: string | null;
};

export type OpenPackInput = {
  name: string;
  categories: string[];
  threshold: number;
  max_rounds: number;
  started_at: string;
};

export type PackSnapshot = {
  pack: PackRow;
  rounds: EvaluationRound[];    // ordenadas por ronda
};

export interface PackRepoPort {
  /** Crea el pack, o devuelve el existente con sus rondas registradas. */
  openPack(input: OpenPackInput): Promise<PackSnapshot>;
  getPack(name: string): Promise<PackSnapshot | null>;
  /** Rechaza rondas duplicadas o no contiguas. Las rondas nunca se actualizan. */
  appendRound(round: EvaluationRound): Promise<void>;
  /** Devuelve false si el pack ya estaba cerrado. */
  closePack(outcome: PackOutcome): Promise<boolean>;
}
