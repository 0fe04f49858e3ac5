import { RegeneratorPort, type RegenerateRequest } from "../../core/ports/RegeneratorPort";
import type { Asset, AssetBatch, GenerationParameters } from "../../core/types/Pack";
import { evolveParameters, variantCount } from "../../core/refine/parameters";
import { pad2 } from "../../core/utils/format";

/** Produce assets virtuales (sin archivos) con la misma evolución de parámetros que el regenerador real. */
export class SimulatedRegenerator extends RegeneratorPort {
  constructor(private readonly defaults: GenerationParameters) {
    super();
  }

  async regenerate(req: RegenerateRequest): Promise<AssetBatch> {
    const parameters = evolveParameters(this.defaults, req.previous?.parameters ?? null, req.deltas);
    const n = variantCount(req.round);
    const assets: Asset[] = [];

    for (const category of Object.keys(parameters.prompts)) {
      for (let i = 1; i <= n; i++) {
        assets.push({
          id: `${category}_r${pad2(req.round)}_${pad2(i)}`,
          category,
          path: null,
          mimeType: "image/png",
        });
      }
    }

    console.log(`[SimulatedRegenerator] ${req.packName} round ${pad2(req.round)}: ${assets.length} virtual assets`);
    return { round: req.round, assets, parameters };
  }
}
