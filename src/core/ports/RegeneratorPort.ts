import type { AssetBatch, Delta } from "../types/Pack";

export interface RegenerateRequest {
  packName: string;
  round: number;                  // ronda a la que corresponde el nuevo lote
  previous: AssetBatch | null;    // null en el primer lote; sin assets al reanudar desde la base
  deltas: readonly Delta[];       // de la evaluación de la ronda anterior
}

export abstract class RegeneratorPort {
  abstract regenerate(req: RegenerateRequest, signal: AbortSignal): Promise<AssetBatch>;
}
