// Utilidades de tiempo para la duración de rondas y los pies de reporte.

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** 65_400 -> "1m 05s", 900 -> "0m 00s" */
export function formatRuntime(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const minutes = Math.floor(total / 60);
  const seconds = total % 60;
  return `${minutes}m ${String(seconds).padStart(2, "0")}s`;
}

export function elapsedMs(from: Date, to: Date): number {
  return Math.max(0, to.getTime() - from.getTime());
}
