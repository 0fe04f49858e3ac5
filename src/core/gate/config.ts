import { ConfigError } from "./errors";

/**
 * Ajustes de una ejecución del gate. Se pasan explícitamente a cada gate para
 * que varios packs corran en paralelo con umbrales distintos.
 */
export interface GateConfig {
  threshold: number;           // 0..10
  maxRounds: number;           // >= 1
  categories: string[];        // claves de selección requeridas, fijas por pack
  callTimeoutMs: number;       // por intento de evaluador / regenerador
  retries: number;             // intentos extra después del primero
  backoffMs: number;           // backoff base entre intentos
}

export function validateGateConfig(cfg: GateConfig): GateConfig {
  if (!Number.isFinite(cfg.threshold) || cfg.threshold < 0 || cfg.threshold > 10) {
    throw new ConfigError(`threshold must be within [0, 10], got ${cfg.threshold}`);
  }
  if (!Number.isInteger(cfg.maxRounds) || cfg.maxRounds < 1) {
    throw new ConfigError(`maxRounds must be a positive integer, got ${cfg.maxRounds}`);
  }
  if (cfg.categories.length === 0) {
    throw new ConfigError("at least one asset category is required");
  }
  if (new Set(cfg.categories).size !== cfg.categories.length) {
    throw new ConfigError(`duplicate categories: ${cfg.categories.join(", ")}`);
  }
  if (!Number.isFinite(cfg.callTimeoutMs) || cfg.callTimeoutMs <= 0) {
    throw new ConfigError(`callTimeoutMs must be positive, got ${cfg.callTimeoutMs}`);
  }
  if (!Number.isInteger(cfg.retries) || cfg.retries < 0 || cfg.retries > 5) {
    throw new ConfigError(`retries must be an integer within [0, 5], got ${cfg.retries}`);
  }
  if (!Number.isFinite(cfg.backoffMs) || cfg.backoffMs < 0) {
    throw new ConfigError(`backoffMs must be >= 0, got ${cfg.backoffMs}`);
  }
  return { ...cfg, categories: [...cfg.categories] };
}
