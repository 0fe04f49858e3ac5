import {
  BRAND_TOKEN_NAMES,
  DELTA_ACTIONS,
  type BrandTokenName,
  type Delta,
  type DeltaAction,
  type DeltaTarget,
} from "../types/Pack";

const BRAND_TOKENS: readonly string[] = BRAND_TOKEN_NAMES;

// prompts.starting → enhance: 'strong central glow'
const DELTA_RE = /^\s*([\w.-]+)\s*(?:→|->)\s*([a-z]+)\s*:\s*(.+?)\s*$/i;

export function isDeltaAction(s: string): s is DeltaAction {
  return (DELTA_ACTIONS as readonly string[]).includes(s);
}

function isBrandToken(s: string): s is BrandTokenName {
  return BRAND_TOKENS.includes(s);
}

/** "prompts.starting" | "brand.texture" -> target; cualquier otra cosa -> null */
export function parseTarget(raw: string): DeltaTarget | null {
  const [head, ...rest] = raw.trim().split(".");
  const name = rest.join(".");
  if (!name) return null;
  if (head === "prompts" || head === "prompt") return { kind: "prompt", category: name };
  if ((head === "brand" || head === "brand_tokens") && isBrandToken(name)) return { kind: "brand", token: name };
  return null;
}

export function formatTarget(t: DeltaTarget): string {
  return t.kind === "prompt" ? `prompts.${t.category}` : `brand.${t.token}`;
}

/**
 * Lee "target → action: 'directive'". Devuelve null si el texto no sigue el
 * formato o nombra una acción desconocida.
 */
export function parseDelta(text: string): Delta | null {
  const m = DELTA_RE.exec(text);
  if (!m) return null;
  const [, rawTarget = "", rawAction = "", rawDirective = ""] = m;

  const target = parseTarget(rawTarget);
  const action = rawAction.toLowerCase();
  const directive = unquote(rawDirective);
  if (!target || !isDeltaAction(action) || !directive) return null;

  return { target, action, directive };
}

export function formatDelta(d: Delta): string {
  return `${formatTarget(d.target)} → ${d.action}: '${d.directive}'`;
}

function unquote(s: string): string {
  const t = s.trim();
  const first = t.charAt(0);
  if ((first === "'" || first === '"') && t.endsWith(first) && t.length >= 2) return t.slice(1, -1).trim();
  return t;
}
