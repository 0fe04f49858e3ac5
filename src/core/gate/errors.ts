import type { GateErrorCode } from "../types/Pack";

/**
 * Error dentro de una ronda del gate. Nunca escapa del gate: se convierte en
 * el resultado FAILED del pack.
 */
export class GateError extends Error {
  constructor(
    readonly code: GateErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GateError";
  }
}

/** Errores que recibe el llamador antes o fuera de una ejecución del gate. */
export class PackClosedError extends Error {
  constructor(readonly packName: string, readonly status: string) {
    super(`Pack "${packName}" is already closed (${status})`);
    this.name = "PackClosedError";
  }
}

export class PackBusyError extends Error {
  constructor(readonly packName: string) {
    super(`Pack "${packName}" is already running in this process`);
    this.name = "PackBusyError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
