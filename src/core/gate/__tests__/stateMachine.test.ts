import { describe, it, expect } from 'vitest';
import { describeState, initialState, transition } from '../stateMachine';

describe('gate state machine', () => {
  it('should walk a continuing round into the next pending round', () => {
    let s = initialState();
    s = transition(s, { type: 'SCORED' });
    s = transition(s, { type: 'DECIDED', outcome: 'CONTINUE' });
    s = transition(s, { type: 'ADVANCE' });

    expect(s).toEqual({ kind: 'ROUND_PENDING', round: 2 });
  });

  it('should map decisions to terminal statuses', () => {
    const scored = transition(initialState(4), { type: 'SCORED' });

    expect(transition(scored, { type: 'DECIDED', outcome: 'STOP_ACCEPT' })).toEqual({
      kind: 'TERMINAL',
      round: 4,
      status: 'ACCEPT',
    });
    expect(transition(scored, { type: 'DECIDED', outcome: 'STOP_MAX_ROUNDS' })).toEqual({
      kind: 'TERMINAL',
      round: 4,
      status: 'MAX_ROUNDS',
    });
  });

  it('should fail a pending round without advancing it', () => {
    expect(transition(initialState(3), { type: 'FAILED' })).toEqual({ kind: 'TERMINAL', round: 3, status: 'FAILED' });
  });

  it('should reject events that skip a state', () => {
    expect(() => transition(initialState(), { type: 'ADVANCE' })).toThrow(
      'illegal gate transition ADVANCE from ROUND_PENDING @ round 01'
    );
  });

  it('should never leave TERMINAL', () => {
    const done = transition(initialState(), { type: 'FAILED' });

    expect(() => transition(done, { type: 'SCORED' })).toThrow(
      'illegal gate transition SCORED from TERMINAL(FAILED) @ round 01'
    );
  });

  it('should describe states for logs', () => {
    expect(describeState({ kind: 'CONTINUING', round: 12 })).toBe('CONTINUING @ round 12');
  });
});
