import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { BrandTokens, GenerationParameters } from "../core/types/Pack";
import type { GateConfig } from "../core/gate/config";
import { ConfigError, errorMessage } from "../core/gate/errors";
import { defaultBrandTokens } from "../core/refine/parameters";
import type { AppConfig } from "./index";

const PACK_NAME_RE = /^[a-z0-9][a-z0-9_-]*$/i;
const COLOR_RE = /^#[0-9a-f]{6}$/i;

const BrandSchema = z
  .object({
    primary_colors: z.array(z.string().regex(COLOR_RE)).min(1),
    secondary_colors: z.array(z.string().regex(COLOR_RE)).min(1),
    texture: z.string().min(1),
    composition: z.string().min(1),
    lighting: z.string().min(1),
    mood: z.string().min(1),
  })
  .partial();

const PackFileSchema = z.object({
  theme: z.string().trim().min(1),
  // las claves son las categorías del pack
  prompts: z
    .record(z.string().trim().min(1))
    .refine((p) => Object.keys(p).length > 0, { message: "at least one category prompt is required" }),
  brand: BrandSchema.default({}),
  threshold: z.number().min(0).max(10).nullable().default(null),
  maxRounds: z.number().int().min(1).nullable().default(null),
});

export type PackConfig = {
  name: string;
  dir: string;
  categories: string[];
  parameters: GenerationParameters;
  threshold: number | null;
  maxRounds: number | null;
};

export function assertPackName(name: string): void {
  if (!PACK_NAME_RE.test(name)) {
    throw new ConfigError(`invalid pack name "${name}" (letters, digits, "_" and "-" only)`);
  }
}

/** Lee y valida packs/<name>/pack.json. */
export async function loadPackConfig(packsRoot: string, name: string): Promise<PackConfig> {
  assertPackName(name);
  const dir = join(packsRoot, name);
  const file = join(dir, "pack.json");

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, "utf8"));
  } catch (e) {
    throw new ConfigError(`cannot read ${file}: ${errorMessage(e)}`);
  }
  return parsePackConfig(raw, name, dir);
}

export function parsePackConfig(raw: unknown, name: string, dir: string): PackConfig {
  const parsed = PackFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "invalid";
    throw new ConfigError(`pack "${name}" config rejected (${where})`);
  }
  const f = parsed.data;
  const d = defaultBrandTokens(f.theme);
  const brand: BrandTokens = {
    primary_colors: f.brand.primary_colors ?? d.primary_colors,
    secondary_colors: f.brand.secondary_colors ?? d.secondary_colors,
    texture: f.brand.texture ?? d.texture,
    composition: f.brand.composition ?? d.composition,
    lighting: f.brand.lighting ?? d.lighting,
    mood: f.brand.mood ?? d.mood,
  };

  return {
    name,
    dir,
    categories: Object.keys(f.prompts),
    parameters: { theme: f.theme, prompts: { ...f.prompts }, brand },
    threshold: f.threshold,
    maxRounds: f.maxRounds,
  };
}

export type GateOverrides = {
  threshold?: number | undefined;
  maxRounds?: number | undefined;
};

/** Prioridad: flags de la CLI > pack.json > variables de entorno. */
export function resolveGateConfig(app: AppConfig, pack: PackConfig, overrides: GateOverrides = {}): GateConfig {
  return {
    threshold: overrides.threshold ?? pack.threshold ?? app.threshold,
    maxRounds: overrides.maxRounds ?? pack.maxRounds ?? app.maxRounds,
    categories: [...pack.categories],
    callTimeoutMs: app.callTimeoutMs,
    retries: app.retries,
    backoffMs: app.backoffMs,
  };
}
