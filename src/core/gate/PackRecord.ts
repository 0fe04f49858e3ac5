import type { EvaluationRound, PackStatus, TerminalStatus } from "../types/Pack";

/**
 * Vista en proceso de un pack: rondas ordenadas y estado. Protege las
 * invariantes de las que dependen los sinks (rondas contiguas desde 1, claves
 * de selección fijas, una sola transición terminal).
 */
export class PackRecord {
  private readonly _rounds: EvaluationRound[] = [];
  private _status: PackStatus = "ACTIVE";

  constructor(
    readonly name: string,
    readonly categories: readonly string[],
    history: readonly EvaluationRound[] = [],
    status: PackStatus = "ACTIVE"
  ) {
    if (categories.length === 0) throw new Error(`pack "${name}" needs at least one category`);
    for (const r of history) this.append(r);
    this._status = status;
  }

  get status(): PackStatus {
    return this._status;
  }

  get rounds(): readonly EvaluationRound[] {
    return this._rounds;
  }

  get nextRound(): number {
    return this._rounds.length + 1;
  }

  get lastRound(): EvaluationRound | null {
    return this._rounds[this._rounds.length - 1] ?? null;
  }

  get scoreTrend(): number[] {
    return this._rounds.map((r) => r.overallScore);
  }

  append(round: EvaluationRound): EvaluationRound {
    if (this._status !== "ACTIVE") {
      throw new Error(`pack "${this.name}" is ${this._status}; no further rounds can be recorded`);
    }
    if (round.packName !== this.name) {
      throw new Error(`round belongs to "${round.packName}", not "${this.name}"`);
    }
    if (round.round !== this.nextRound) {
      throw new Error(`pack "${this.name}" expects round ${this.nextRound}, got ${round.round}`);
    }
    const keys = Object.keys(round.selections).sort();
    const expected = [...this.categories].sort();
    if (keys.length !== expected.length || keys.some((k, i) => k !== expected[i])) {
      throw new Error(`round ${round.round} selections [${keys.join(", ")}] do not match categories [${expected.join(", ")}]`);
    }

    const frozen = freezeRound(round);
    this._rounds.push(frozen);
    return frozen;
  }

  close(status: TerminalStatus): void {
    if (this._status !== "ACTIVE") {
      throw new Error(`pack "${this.name}" already reached ${this._status}`);
    }
    this._status = status;
  }
}

export function freezeRound(round: EvaluationRound): EvaluationRound {
  if (Object.isFrozen(round)) return round;
  return deepFreeze(structuredClone(round));
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
