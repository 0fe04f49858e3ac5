import {
  BRAND_TEXT_TOKENS,
  type BrandTextToken,
  type BrandTokens,
  type Delta,
  type DeltaAction,
  type GenerationParameters,
} from "../types/Pack";
import { formatDelta } from "./deltas";

/**
 * Aplica los deltas de mejora sobre una copia de los parámetros de generación.
 * Los deltas a categorías desconocidas se omiten; los colores solo cambian con
 * un update explícito de marca, nunca por deltas de texto.
 */
export function applyDeltas(
  params: GenerationParameters,
  deltas: readonly Delta[]
): { parameters: GenerationParameters; applied: Delta[]; skipped: Delta[] } {
  const prompts = { ...params.prompts };
  const brand: BrandTokens = {
    ...params.brand,
    primary_colors: [...params.brand.primary_colors],
    secondary_colors: [...params.brand.secondary_colors],
  };
  const applied: Delta[] = [];
  const skipped: Delta[] = [];

  for (const d of deltas) {
    if (d.target.kind === "prompt") {
      const current = prompts[d.target.category];
      if (current === undefined) {
        skipped.push(d);
        continue;
      }
      prompts[d.target.category] = refineText(current, d.action, d.directive);
      applied.push(d);
      continue;
    }

    const token = d.target.token;
    if (!isTextToken(token)) {
      skipped.push(d);
      continue;
    }
    brand[token] = refineText(brand[token], d.action, d.directive);
    applied.push(d);
  }

  for (const d of skipped) {
    console.warn(`[refine] skipped delta ${formatDelta(d)}`);
  }

  return { parameters: { theme: params.theme, prompts, brand }, applied, skipped };
}

export function refineText(original: string, action: DeltaAction, directive: string): string {
  const base = original.trimEnd().replace(/[.,;]+$/, "");
  switch (action) {
    case "enhance":
    case "strengthen":
      return base ? `${base}, ${directive}` : directive;
    case "refine":
    case "adjust":
      return base ? `${base}. Refinement: ${directive}` : directive;
    case "simplify":
      return base ? `${base}. Keep it simple: ${directive}` : directive;
    case "vary":
      return base ? `${base}. Variation: ${directive}` : directive;
  }
}

function isTextToken(t: string): t is BrandTextToken {
  return (BRAND_TEXT_TOKENS as readonly string[]).includes(t);
}

export function validateParameters(params: GenerationParameters): string[] {
  const warnings: string[] = [];

  for (const [category, text] of Object.entries(params.prompts)) {
    if (!text.trim()) warnings.push(`${category}: empty prompt`);
    else if (text.length < 10) warnings.push(`${category}: prompt too short (${text.length} chars)`);
    if (text.length > 2000) warnings.push(`${category}: prompt very long (${text.length} chars)`);
  }

  for (const token of BRAND_TEXT_TOKENS) {
    const value = params.brand[token];
    if (value.length > 200) warnings.push(`brand.${token} exceeds 200 characters (${value.length})`);
  }
  for (const key of ["primary_colors", "secondary_colors"] as const) {
    for (const color of params.brand[key]) {
      if (!/^#[0-9a-f]{6}$/i.test(color)) warnings.push(`brand.${key}: invalid color ${color}`);
    }
  }

  return warnings;
}

/** La ronda 1 explora, las siguientes acotan. */
export function variantCount(round: number): number {
  if (round <= 1) return 3;
  if (round === 2) return 2;
  return 1;
}

export function defaultBrandTokens(theme: string): BrandTokens {
  const t = theme.toLowerCase();
  if (t.includes("cyberpunk") || t.includes("neon")) {
    return {
      primary_colors: ["#FF00FF", "#00FFFF", "#FFD700"],
      secondary_colors: ["#1A1A2E", "#16213E", "#0F3460"],
      texture: "wet glass with specular highlights, chrome reflections",
      composition: "rule of thirds, golden ratio focal point, dynamic asymmetry",
      lighting: "neon glow, strong backlight, volumetric fog, rim lighting",
      mood: "cyberpunk, energetic, futuristic, mysterious",
    };
  }
  if (t.includes("fantasy") || t.includes("magic")) {
    return {
      primary_colors: ["#8B00FF", "#FF1493", "#FFD700"],
      secondary_colors: ["#2C003E", "#4B0082", "#6A0DAD"],
      texture: "ethereal glow, particle effects, magical sparkles",
      composition: "centered symmetry, mystical framing, depth of field",
      lighting: "soft ambient glow, magical aura, ethereal backlight",
      mood: "magical, enchanting, mystical, dreamlike",
    };
  }
  return {
    primary_colors: ["#FF6B6B", "#4ECDC4", "#FFE66D"],
    secondary_colors: ["#2C2C2C", "#3D3D3D", "#4E4E4E"],
    texture: "clean surface, subtle gradients",
    composition: "balanced layout, clear focal point",
    lighting: "soft natural light, balanced shadows",
    mood: "modern, professional, engaging",
  };
}

/** Prompt completo que se envía al modelo de imágenes para una categoría. */
export function renderPrompt(params: GenerationParameters, category: string): string {
  const template = params.prompts[category] ?? "";
  const body = template.replace(/\{theme\}/g, params.theme).replace(/\{kind\}/g, category);
  const b = params.brand;
  return [
    body,
    `Palette: ${[...b.primary_colors, ...b.secondary_colors].join(", ")}.`,
    `Texture: ${b.texture}. Composition: ${b.composition}. Lighting: ${b.lighting}. Mood: ${b.mood}.`,
  ].join("\n");
}

/**
 * Parámetros del siguiente lote: los del lote anterior (o los defaults del
 * pack si no hay) con los deltas de la última ronda aplicados.
 */
export function evolveParameters(
  defaults: GenerationParameters,
  previous: GenerationParameters | null,
  deltas: readonly Delta[]
): GenerationParameters {
  const { parameters } = applyDeltas(previous ?? defaults, deltas);
  for (const w of validateParameters(parameters)) console.warn(`[refine] ${w}`);
  return parameters;
}
