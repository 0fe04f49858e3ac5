import type { AssetBatch, PackOutcome } from "../types/Pack";
import type { GateConfig } from "./config";
import { PackBusyError } from "./errors";
import type { QualityGate } from "./QualityGate";

export interface PackJob {
  packName: string;
  config: GateConfig;
  initialBatch?: AssetBatch | undefined;
}

export type PackRunResult =
  | { packName: string; ok: true; outcome: PackOutcome }
  | { packName: string; ok: false; error: Error };

// packs con un gate corriendo en este proceso
const inFlight = new Set<string>();

export function isRunning(packName: string): boolean {
  return inFlight.has(packName);
}

/** Corre un pack; rechaza una segunda ejecución simultánea del mismo pack. */
export async function runPack(gate: QualityGate, job: PackJob, signal?: AbortSignal): Promise<PackOutcome> {
  if (inFlight.has(job.packName)) throw new PackBusyError(job.packName);
  inFlight.add(job.packName);
  try {
    return await gate.run(job.packName, job.config, { initialBatch: job.initialBatch, signal });
  } finally {
    inFlight.delete(job.packName);
  }
}

/**
 * Corre todos los packs en paralelo, un gate por pack. Si uno lanza error
 * (cerrado, ocupado, config inválida) los demás siguen.
 */
export async function runPacks(
  jobs: readonly PackJob[],
  gateFor: (job: PackJob) => QualityGate,
  signal?: AbortSignal
): Promise<PackRunResult[]> {
  const settled = await Promise.allSettled(jobs.map(async (job) => runPack(gateFor(job), job, signal)));

  return settled.map((s, i): PackRunResult => {
    const packName = jobs[i]?.packName ?? `#${i}`;
    if (s.status === "fulfilled") return { packName, ok: true, outcome: s.value };
    const error = s.reason instanceof Error ? s.reason : new Error(String(s.reason));
    console.error(`[runPacks] "${packName}" did not run: ${error.message}`);
    return { packName, ok: false, error };
  });
}
