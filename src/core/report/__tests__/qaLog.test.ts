import { describe, it, expect } from 'vitest';
import { renderHistory, renderOperatorMessage, renderRoundReport, renderSummary } from '../qaLog';
import type { EvaluationRound, PackOutcome } from '../../types/Pack';
import { roundFixture } from '../../gate/__tests__/fixtures';

const accepted: EvaluationRound = {
  ...roundFixture(2, 8.6),
  decision: { outcome: 'STOP_ACCEPT', reason: 'Score 8.6 >= threshold 8.5' },
};

const outcome: PackOutcome = {
  packName: 'neon',
  status: 'ACCEPT',
  finalRound: 2,
  reason: 'Score 8.6 >= threshold 8.5',
  failure: null,
  rounds: [roundFixture(1, 8), accepted],
  closedAt: '2025-01-01T00:05:00.000Z',
};

describe('renderRoundReport', () => {
  it('should render every section in order', () => {
    expect(renderRoundReport(roundFixture(1, 8))).toBe(
      [
        '# Round 01 - Quality Assurance Report',
        '',
        '**Pack:** neon',
        '**Evaluator:** test-critic',
        '',
        '## Overall Score',
        '',
        '8/10',
        '',
        '## Dimension Scores',
        '',
        '- **Brand Consistency:** 8/10 - palette matches',
        '- **Technical Quality:** 8/10 - sharp',
        '- **Compliance:** 8/10 - no logos',
        '- **Visual Appeal:** 8/10 - clear focal point',
        '',
        '## Critical Issues',
        '',
        'None',
        '',
        '## Selected Assets',
        '',
        '- starting: starting_a',
        '- brb: brb_a',
        '',
        '## Deltas for Next Round',
        '',
        "1. prompts.brb → refine: 'softer signs'",
        '',
        '## Decision',
        '',
        '**Decision:** CONTINUE',
        '**Reason:** Score 8 < threshold 8.5; continuing to round 02',
        '',
        '## Timing',
        '',
        '**Started:** 2025-01-01T00:00:00.000Z',
        '**Finished:** 2025-01-01T00:01:05.000Z',
        '**Runtime:** 1m 05s',
        '',
      ].join('\n')
    );
  });

  it('should mark simulated evaluators and list critical issues', () => {
    const round: EvaluationRound = {
      ...roundFixture(1, 8),
      criticalIssues: ['logo visible in corner'],
      deltas: [],
      evaluator: { model: 'simulated', authoritative: false },
    };
    const lines = renderRoundReport(round).split('\n');

    expect(lines).toContain('**Evaluator:** simulated (simulated, non-authoritative)');
    expect(lines).toContain('- logo visible in corner');
    expect(lines).toContain('(No improvements suggested)');
  });
});

describe('renderSummary', () => {
  it('should tabulate the score progression', () => {
    const lines = renderSummary(outcome).split('\n');

    expect(lines).toContain('| 01 | 8.0 | 8.0 | 8.0 | 8.0 | 8.0 | CONTINUE |');
    expect(lines).toContain('| 02 | 8.6 | 8.6 | 8.6 | 8.6 | 8.6 | STOP-ACCEPT |');
    expect(lines).toContain('**Status:** ACCEPT');
    expect(lines).toContain('**Total Runtime:** 2m 10s');
  });

  it('should name the failed round', () => {
    const failed: PackOutcome = {
      ...outcome,
      status: 'FAILED',
      finalRound: 3,
      reason: 'EvaluationFailed: critic offline',
      failure: { code: 'EvaluationFailed', message: 'critic offline', round: 3 },
    };

    expect(renderSummary(failed).split('\n')).toContain('**Failed Round:** 03 (EvaluationFailed)');
  });

  it('should say when no rounds were recorded', () => {
    const lines = renderSummary({ ...outcome, rounds: [] }).split('\n');

    expect(lines).toContain('(No rounds recorded)');
    expect(lines).toContain('**Total Runtime:** 0m 00s');
  });
});

describe('renderOperatorMessage', () => {
  it('should summarise status, reason and trend', () => {
    expect(renderOperatorMessage(outcome)).toBe(
      [
        'Pack "neon": ACCEPT at round 02',
        'Reason: Score 8.6 >= threshold 8.5',
        'Scores: 8.0 -> 8.6',
        '- round 01: 8 CONTINUE',
        '- round 02: 8.6 STOP-ACCEPT',
      ].join('\n')
    );
  });
});

describe('renderHistory', () => {
  it('should list the recorded rounds', () => {
    const text = renderHistory({
      pack: {
        name: 'neon',
        categories: ['starting', 'brb'],
        threshold: 8.5,
        max_rounds: 3,
        status: 'ACCEPT',
        reason: 'Score 8.6 >= threshold 8.5',
        failure_code: null,
        failure_message: null,
        failed_round: null,
        started_at: '2025-01-01T00:00:00.000Z',
        closed_at: '2025-01-01T00:05:00.000Z',
      },
      rounds: [roundFixture(1, 8), accepted],
    });

    expect(text).toBe(
      [
        'Pack: neon',
        'Status: ACCEPT (Score 8.6 >= threshold 8.5)',
        'Categories: starting, brb',
        'Threshold: 8.5  Max rounds: 3',
        'Scores: 8.0 -> 8.6',
        '  round 01: 8 CONTINUE',
        '  round 02: 8.6 STOP-ACCEPT',
      ].join('\n')
    );
  });
});
