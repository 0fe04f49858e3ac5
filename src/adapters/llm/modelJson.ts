/**
 * Parser tolerante para respuestas del modelo: prueba el texto tal cual, luego
 * sin fences de Markdown, luego el primer bloque {...} balanceado. Devuelve
 * null si nada parsea.
 */
export function safeParseModelJSON(s: string): unknown {
  if (!s.trim()) return null;
  const direct = tryParse(s);
  if (direct !== undefined) return direct;

  const unfenced = stripFences(s).trim();
  if (unfenced !== s.trim()) {
    const parsed = tryParse(unfenced);
    if (parsed !== undefined) return parsed;
  }

  const extracted = extractFirstJsonObject(unfenced);
  if (extracted) {
    const parsed = tryParse(extracted);
    if (parsed !== undefined) return parsed;
  }
  return null;
}

function tryParse(s: string): unknown {
  try {
    const value: unknown = JSON.parse(s);
    return value;
  } catch {
    return undefined;
  }
}

export function stripFences(s: string): string {
  let t = s.trim();
  if (t.startsWith("```")) {
    t = t.replace(/^```(?:json)?\s*/i, "");
    t = t.replace(/```$/i, "");
  }
  return t.replace(/```/g, "");
}

export function extractFirstJsonObject(s: string): string | null {
  const start = s.indexOf("{");
  if (start < 0) return null;
  let depth = 0;
  let inStr = false;
  let esc = false;

  for (let i = start; i < s.length; i++) {
    const ch = s[i];
    if (inStr) {
      if (esc) esc = false;
      else if (ch === "\\") esc = true;
      else if (ch === '"') inStr = false;
      continue;
    }
    if (ch === '"') {
      inStr = true;
      continue;
    }
    if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return s.slice(start, i + 1);
    }
  }
  return null;
}
