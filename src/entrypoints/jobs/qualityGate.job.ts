import type { Client } from "@libsql/client";
import type { AppConfig } from "../../config";
import { loadPackConfig, resolveGateConfig, type GateOverrides, type PackConfig } from "../../config/packConfig";
import { createDb } from "../../db/db";
import { LibsqlPackRepo } from "../../adapters/repo/LibsqlPackRepo";
import { InMemoryPackRepo } from "../../adapters/repo/InMemoryPackRepo";
import { createCritic } from "../../adapters/llm";
import { GeminiImageRegenerator } from "../../adapters/imagegen/GeminiImageRegenerator";
import { SimulatedRegenerator } from "../../adapters/imagegen/SimulatedRegenerator";
import { MarkdownReportWriter } from "../../adapters/report/MarkdownReportWriter";
import { TelegramHttpNotifier } from "../../adapters/notifier/TelegramHttpNotifier";
import { ConsoleNotifier } from "../../adapters/notifier/ConsoleNotifier";
import { QualityGate, type QualityGateOptions } from "../../core/gate/QualityGate";
import { runPacks, type PackJob, type PackRunResult } from "../../core/gate/runPacks";
import type { RegeneratorPort } from "../../core/ports/RegeneratorPort";
import type { NotifierPort } from "../../core/ports/NotifierPort";
import type { PackRepoPort } from "../../core/ports/PackRepoPort";

export type QualityGateJobOptions = GateOverrides & {
  packs: string[];
  /** Crítico y regenerador simulados. */
  simulated?: boolean | undefined;
  /** Adaptadores simulados, repo en memoria, sin archivos de reporte. */
  dryRun?: boolean | undefined;
  reports?: boolean | undefined;
  signal?: AbortSignal | undefined;
};

/**
 * Arma config, adaptadores y un gate por pack, y corre los packs en paralelo.
 * Los packs cuyo pack.json no carga se reportan como no ejecutados.
 */
export async function runQualityGateJob(app: AppConfig, opts: QualityGateJobOptions): Promise<PackRunResult[]> {
  const dryRun = opts.dryRun ?? false;
  const simulated = dryRun || (opts.simulated ?? false) || !app.geminiApiKey;
  if (simulated && !dryRun && !opts.simulated) {
    console.warn("[qualityGate.job] GEMINI_API_KEY missing: running with simulated critic and regenerator.");
  }

  const loaded = await Promise.allSettled(opts.packs.map((name) => loadPackConfig(app.packsRoot, name)));
  const failedLoads: PackRunResult[] = [];
  const packs = new Map<string, PackConfig>();
  const jobs: PackJob[] = [];
  loaded.forEach((r, i) => {
    const packName = opts.packs[i] ?? `#${i}`;
    if (r.status === "fulfilled") {
      packs.set(packName, r.value);
      jobs.push({
        packName,
        config: resolveGateConfig(app, r.value, { threshold: opts.threshold, maxRounds: opts.maxRounds }),
      });
    } else {
      const error = r.reason instanceof Error ? r.reason : new Error(String(r.reason));
      console.error(`[qualityGate.job] "${packName}" not loaded: ${error.message}`);
      failedLoads.push({ packName, ok: false, error });
    }
  });

  let db: Client | null = null;
  let repo: PackRepoPort;
  if (dryRun) {
    repo = new InMemoryPackRepo();
  } else {
    db = createDb(app.databaseUrl, app.databaseAuthToken);
    repo = new LibsqlPackRepo(db);
  }

  const critic = createCritic(app, simulated ? "simulated" : "gemini");
  const { notifier, operator } = createNotifier(app);
  const gateOpts: QualityGateOptions = { operator };
  if (!dryRun && (opts.reports ?? true)) gateOpts.reports = new MarkdownReportWriter(app.packsRoot);

  try {
    const results = await runPacks(
      jobs,
      (job) => new QualityGate(repo, critic, regeneratorFor(app, packOf(packs, job.packName), simulated), notifier, gateOpts),
      opts.signal
    );
    return [...failedLoads, ...results];
  } finally {
    db?.close();
  }
}

function regeneratorFor(app: AppConfig, pack: PackConfig, simulated: boolean): RegeneratorPort {
  if (simulated || !app.geminiApiKey) return new SimulatedRegenerator(pack.parameters);
  return new GeminiImageRegenerator({
    apiKey: app.geminiApiKey,
    packDir: pack.dir,
    defaults: pack.parameters,
    model: app.imageModel,
    baseUrl: app.geminiBaseUrl,
  });
}

function createNotifier(app: AppConfig): { notifier: NotifierPort; operator: string } {
  if (app.telegram) {
    return { notifier: new TelegramHttpNotifier(app.telegram.token), operator: app.telegram.operatorChatId };
  }
  return { notifier: new ConsoleNotifier(), operator: "operator" };
}

function packOf(packs: Map<string, PackConfig>, name: string): PackConfig {
  const p = packs.get(name);
  if (!p) throw new Error(`[qualityGate.job] no config loaded for "${name}"`);
  return p;
}
