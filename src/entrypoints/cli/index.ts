#!/usr/bin/env node
import "dotenv/config";
import { parseArgs } from "node:util";
import { loadConfig, type AppConfig } from "../../config";
import { assertPackName } from "../../config/packConfig";
import { createDb } from "../../db/db";
import { LibsqlPackRepo } from "../../adapters/repo/LibsqlPackRepo";
import { ConfigError, errorMessage } from "../../core/gate/errors";
import type { PackRunResult } from "../../core/gate/runPacks";
import { renderHistory } from "../../core/report/qaLog";
import { pad2 } from "../../core/utils/format";
import { runQualityGateJob } from "../jobs/qualityGate.job";

const USAGE = `Usage:
  pack-qa run <pack...> [--max-rounds N] [--threshold X] [--simulated] [--dry-run] [--no-reports]
  pack-qa history <pack>`;

/** Devuelve el exit code del proceso. */
export async function main(argv: string[], app: AppConfig = loadConfig()): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "max-rounds": { type: "string" },
      threshold: { type: "string" },
      simulated: { type: "boolean", default: false },
      "dry-run": { type: "boolean", default: false },
      "no-reports": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const [command, ...args] = positionals;
  if (values.help || !command) {
    console.log(USAGE);
    return values.help ? 0 : 1;
  }

  if (command === "run") {
    if (!args.length) throw new ConfigError("run needs at least one pack name");
    const controller = new AbortController();
    const onSigint = () => {
      console.warn("[cli] interrupted; stopping running packs");
      controller.abort(new Error("interrupted by operator"));
    };
    process.once("SIGINT", onSigint);
    try {
      const results = await runQualityGateJob(app, {
        packs: args,
        threshold: optionalNumber(values.threshold, "--threshold"),
        maxRounds: optionalNumber(values["max-rounds"], "--max-rounds"),
        simulated: values.simulated,
        dryRun: values["dry-run"],
        reports: !values["no-reports"],
        signal: controller.signal,
      });
      printResults(results);
      return results.every((r) => r.ok && r.outcome.status !== "FAILED") ? 0 : 1;
    } finally {
      process.off("SIGINT", onSigint);
    }
  }

  if (command === "history") {
    const [packName] = args;
    if (!packName) throw new ConfigError("history needs a pack name");
    assertPackName(packName);
    const db = createDb(app.databaseUrl, app.databaseAuthToken);
    try {
      const snapshot = await new LibsqlPackRepo(db).getPack(packName);
      if (!snapshot) {
        console.log(`No history for pack "${packName}"`);
        return 1;
      }
      console.log(renderHistory(snapshot));
      return 0;
    } finally {
      db.close();
    }
  }

  console.error(`Unknown command "${command}"\n${USAGE}`);
  return 1;
}

function printResults(results: PackRunResult[]): void {
  for (const r of results) {
    if (r.ok) {
      console.log(`${r.packName}: ${r.outcome.status} at round ${pad2(r.outcome.finalRound)} - ${r.outcome.reason}`);
    } else {
      console.log(`${r.packName}: NOT RUN - ${r.error.message}`);
    }
  }
}

function optionalNumber(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ConfigError(`${flag} must be a number, got "${raw}"`);
  return n;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      console.error(`[cli] ${errorMessage(e)}`);
      process.exitCode = e instanceof ConfigError ? 2 : 1;
    });
}
