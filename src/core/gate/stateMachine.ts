import type { DecisionOutcome, TerminalStatus } from "../types/Pack";

export type GateState =
  | { kind: "ROUND_PENDING"; round: number }
  | { kind: "ROUND_SCORED"; round: number }
  | { kind: "CONTINUING"; round: number }
  | { kind: "TERMINAL"; round: number; status: TerminalStatus };

export type GateEvent =
  | { type: "SCORED" }
  | { type: "DECIDED"; outcome: DecisionOutcome }
  | { type: "ADVANCE" }
  | { type: "FAILED" };

export function initialState(round = 1): GateState {
  return { kind: "ROUND_PENDING", round };
}

/**
 * ROUND_PENDING --SCORED--> ROUND_SCORED --DECIDED--> CONTINUING | TERMINAL
 * CONTINUING --ADVANCE--> ROUND_PENDING(round + 1)
 * ROUND_PENDING --FAILED--> TERMINAL(FAILED), misma ronda
 */
export function transition(state: GateState, event: GateEvent): GateState {
  switch (state.kind) {
    case "ROUND_PENDING":
      if (event.type === "SCORED") return { kind: "ROUND_SCORED", round: state.round };
      if (event.type === "FAILED") return { kind: "TERMINAL", round: state.round, status: "FAILED" };
      break;
    case "ROUND_SCORED":
      if (event.type === "DECIDED") {
        if (event.outcome === "CONTINUE") return { kind: "CONTINUING", round: state.round };
        return {
          kind: "TERMINAL",
          round: state.round,
          status: event.outcome === "STOP_ACCEPT" ? "ACCEPT" : "MAX_ROUNDS",
        };
      }
      break;
    case "CONTINUING":
      if (event.type === "ADVANCE") return { kind: "ROUND_PENDING", round: state.round + 1 };
      break;
    case "TERMINAL":
      break;
  }
  throw new Error(`illegal gate transition ${event.type} from ${describeState(state)}`);
}

export function describeState(state: GateState): string {
  const r = String(state.round).padStart(2, "0");
  return state.kind === "TERMINAL" ? `TERMINAL(${state.status}) @ round ${r}` : `${state.kind} @ round ${r}`;
}
