/** 8.1 -> "8.1", 8.46 -> "8.46", 8 -> "8" */
export function formatScore(n: number): string {
  return String(Number(n.toFixed(2)));
}

export function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function truncate(s: string, max: number): string {
  return s.length <= max ? s : `${s.slice(0, Math.max(0, max - 3))}...`;
}

/** "brand_consistency" -> "Brand Consistency" */
export function titleCase(key: string): string {
  return key
    .split("_")
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}
