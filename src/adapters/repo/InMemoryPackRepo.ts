import type { OpenPackInput, PackRepoPort, PackRow, PackSnapshot } from "../../core/ports/PackRepoPort";
import type { EvaluationRound, PackOutcome } from "../../core/types/Pack";
import { freezeRound } from "../../core/gate/PackRecord";

/** Repo en memoria para dry runs y tests. Mismas reglas que el de libsql. */
export class InMemoryPackRepo implements PackRepoPort {
  private readonly packs = new Map<string, { pack: PackRow; rounds: EvaluationRound[] }>();

  async openPack(input: OpenPackInput): Promise<PackSnapshot> {
    if (!this.packs.has(input.name)) {
      this.packs.set(input.name, {
        pack: {
          name: input.name,
          categories: [...input.categories],
          threshold: input.threshold,
          max_rounds: input.max_rounds,
          status: "ACTIVE",
          reason: null,
          failure_code: null,
          failure_message: null,
          failed_round: null,
          started_at: input.started_at,
          closed_at: null,
        },
        rounds: [],
      });
    }
    return this.snapshot(input.name);
  }

  async getPack(name: string): Promise<PackSnapshot | null> {
    return this.packs.has(name) ? this.snapshot(name) : null;
  }

  async appendRound(round: EvaluationRound): Promise<void> {
    const entry = this.packs.get(round.packName);
    if (!entry || entry.pack.status !== "ACTIVE" || round.round !== entry.rounds.length + 1) {
      throw new Error(`[InMemoryPackRepo] round ${round.round} of "${round.packName}" rejected (pack closed or round not next)`);
    }
    entry.rounds.push(freezeRound(round));
  }

  async closePack(o: PackOutcome): Promise<boolean> {
    const entry = this.packs.get(o.packName);
    if (!entry || entry.pack.status !== "ACTIVE") return false;
    entry.pack = {
      ...entry.pack,
      status: o.status,
      reason: o.reason,
      failure_code: o.failure?.code ?? null,
      failure_message: o.failure?.message ?? null,
      failed_round: o.failure?.round ?? null,
      closed_at: o.closedAt,
    };
    return true;
  }

  private snapshot(name: string): PackSnapshot {
    const entry = this.packs.get(name);
    if (!entry) throw new Error(`[InMemoryPackRepo] unknown pack "${name}"`);
    return { pack: { ...entry.pack, categories: [...entry.pack.categories] }, rounds: [...entry.rounds] };
  }
}
