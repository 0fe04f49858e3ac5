import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { RegeneratorPort, type RegenerateRequest } from "../../core/ports/RegeneratorPort";
import type { Asset, AssetBatch, GenerationParameters } from "../../core/types/Pack";
import { evolveParameters, renderPrompt, variantCount } from "../../core/refine/parameters";
import { pad2 } from "../../core/utils/format";
import { DEFAULT_GEMINI_BASE_URL, GeminiHttpError, generateContent } from "../llm/geminiHttp";

export const DEFAULT_IMAGE_MODEL = "gemini-2.5-flash-image";

type GeminiImageOptions = {
  apiKey: string;
  /** packs/<pack>; las imágenes quedan en 01_raw/round<NN>/ debajo */
  packDir: string;
  defaults: GenerationParameters;
  model?: string | undefined;
  baseUrl?: string | undefined;
  fetchImpl?: typeof fetch | undefined;
};

const EXTENSIONS: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/webp": "webp",
};

/**
 * Genera variantCount(round) imágenes por categoría con el modelo de imágenes
 * de Gemini y las escribe en el directorio raw del pack.
 */
export class GeminiImageRegenerator extends RegeneratorPort {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: GeminiImageOptions) {
    super();
    this.apiKey = opts.apiKey.trim();
    if (!this.apiKey) throw new Error("[GeminiImageRegenerator] apiKey is required");
    this.model = (opts.model ?? DEFAULT_IMAGE_MODEL).trim();
    this.baseUrl = opts.baseUrl ?? DEFAULT_GEMINI_BASE_URL;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async regenerate(req: RegenerateRequest, signal: AbortSignal): Promise<AssetBatch> {
    const parameters = evolveParameters(this.opts.defaults, req.previous?.parameters ?? null, req.deltas);
    const n = variantCount(req.round);
    const dir = join(this.opts.packDir, "01_raw", `round${pad2(req.round)}`);
    await mkdir(dir, { recursive: true });

    const assets: Asset[] = [];
    for (const category of Object.keys(parameters.prompts)) {
      const prompt = renderPrompt(parameters, category);
      for (let i = 1; i <= n; i++) {
        const image = await this.render(prompt, signal);
        const id = `${category}_${pad2(i)}`;
        const path = join(dir, `${id}.${EXTENSIONS[image.mimeType] ?? "png"}`);
        await writeFile(path, Buffer.from(image.data, "base64"));
        assets.push({ id, category, path, mimeType: image.mimeType });
      }
    }

    console.log(`[GeminiImageRegenerator] ${req.packName} round ${pad2(req.round)}: ${assets.length} images in ${dir}`);
    return { round: req.round, assets, parameters };
  }

  private async render(prompt: string, signal: AbortSignal): Promise<{ mimeType: string; data: string }> {
    const parts = await generateContent({
      apiKey: this.apiKey,
      model: this.model,
      baseUrl: this.baseUrl,
      body: {
        contents: [{ parts: [{ text: prompt }] }],
        generationConfig: { responseModalities: ["TEXT", "IMAGE"] },
      },
      signal,
      fetchImpl: this.fetchImpl,
    });

    for (const p of parts) {
      if (p.inlineData) return p.inlineData;
    }
    throw new GeminiHttpError("Gemini image model returned no image", null, true);
  }
}
