import { describe, it, expect } from 'vitest';
import type { ImprovementOpportunity, TaskRecord } from '@selfwright/core';
import { OpportunityAnalyzer, normalizeError } from '../opportunity-analyzer.js';

const NOW = Date.parse('2026-03-01T12:00:00.000Z');
let counter = 0;

function makeTask(overrides: Partial<TaskRecord> = {}): TaskRecord {
  counter++;
  return {
    id: `task-${counter}`,
    request: `request ${counter}`,
    toolsUsed: ['browser'],
    success: true,
    durationMs: 100,
    timestamp: new Date(NOW - 60_000).toISOString(),
    ...overrides,
  };
}

function failure(error: string | undefined, overrides: Partial<TaskRecord> = {}): TaskRecord {
  return makeTask({ success: false, error, toolsUsed: ['shell'], ...overrides });
}

function analyzerFor(history: TaskRecord[]): OpportunityAnalyzer {
  return new OpportunityAnalyzer({ list: async () => history });
}

function ofType<T extends ImprovementOpportunity['type']>(
  found: ImprovementOpportunity[],
  type: T,
): Extract<ImprovementOpportunity, { type: T }>[] {
  return found.filter((o): o is Extract<ImprovementOpportunity, { type: T }> => o.type === type);
}

describe('normalizeError', () => {
  it('lower-cases, collapses whitespace and masks digit runs', () => {
    expect(normalizeError('  Timeout   AFTER 30s\n')).toBe('timeout after #s');
    expect(normalizeError('Port 8080 in use')).toBe('port # in use');
  });

  it('maps missing or blank errors to "unknown"', () => {
    expect(normalizeError(undefined)).toBe('unknown');
    expect(normalizeError('   ')).toBe('unknown');
  });
});

describe('OpportunityAnalyzer', () => {
  describe('failure clustering', () => {
    it('turns three identical failures into one fix-failure at priority 8', async () => {
      const history = [1, 2, 3].map(() => failure('Permission denied'));
      const fixes = ofType(await analyzerFor(history).analyze(NOW), 'fix-failure');

      expect(fixes).toHaveLength(1);
      expect(fixes[0].priority).toBe(8);
      expect(fixes[0].context.occurrenceCount).toBe(3);
      expect(fixes[0].context.toolsInvolved).toEqual(['shell']);
    });

    it('raises the priority to 9 with a fourth failure', async () => {
      const history = [1, 2, 3, 4].map(() => failure('Permission denied'));
      const fixes = ofType(await analyzerFor(history).analyze(NOW), 'fix-failure');

      expect(fixes).toHaveLength(1);
      expect(fixes[0].priority).toBe(9);
    });

    it('caps the priority at 10', async () => {
      const history = Array.from({ length: 12 }, () => failure('Permission denied'));
      const [fix] = ofType(await analyzerFor(history).analyze(NOW), 'fix-failure');
      expect(fix.priority).toBe(10);
    });

    it('clusters errors that differ only in numbers and spacing', async () => {
      const history = [failure('Timeout after 30s'), failure('  timeout   AFTER 45s ')];
      const fixes = ofType(await analyzerFor(history).analyze(NOW), 'fix-failure');

      expect(fixes).toHaveLength(1);
      expect(fixes[0].context.errorMessage).toBe('Timeout after 30s');
      expect(fixes[0].priority).toBe(7);
    });

    it('groups failures without an error message under "unknown"', async () => {
      const fixes = ofType(await analyzerFor([failure(undefined), failure('')]).analyze(NOW), 'fix-failure');
      expect(fixes).toHaveLength(1);
      expect(fixes[0].context.errorMessage).toBe('unknown');
    });

    it('ignores a single failure', async () => {
      expect(await analyzerFor([failure('Permission denied')]).analyze(NOW)).toEqual([]);
    });

    it('ignores failures outside the window', async () => {
      const old = new Date(NOW - 8 * 24 * 60 * 60 * 1000).toISOString();
      const history = [failure('Permission denied', { timestamp: old }), failure('Permission denied', { timestamp: old })];
      expect(await analyzerFor(history).analyze(NOW)).toEqual([]);
    });
  });

  describe('latency outliers', () => {
    function latencyHistory(fastCount: number): TaskRecord[] {
      return [
        ...Array.from({ length: fastCount }, () => makeTask({ durationMs: 100 })),
        makeTask({ toolsUsed: ['ocr'], durationMs: 5000 }),
        makeTask({ toolsUsed: ['ocr'], durationMs: 5000 }),
      ];
    }

    it('reports tools that are repeatedly far slower than the mean', async () => {
      const slow = ofType(await analyzerFor(latencyHistory(10)).analyze(NOW), 'optimize-speed');

      expect(slow).toHaveLength(1);
      expect(slow[0].priority).toBe(6);
      expect(slow[0].context).toEqual({ toolName: 'ocr', avgDurationMs: 5000, occurrenceCount: 2 });
    });

    it('needs the minimum number of successful samples', async () => {
      expect(ofType(await analyzerFor(latencyHistory(7)).analyze(NOW), 'optimize-speed')).toEqual([]);
    });
  });

  describe('pattern repetition', () => {
    it('reports a tool sequence repeated three times', async () => {
      const history = [1, 2, 3].map(() => makeTask({ toolsUsed: ['browser', 'clipboard'] }));
      const patterns = ofType(await analyzerFor(history).analyze(NOW), 'automate-pattern');

      expect(patterns).toHaveLength(1);
      expect(patterns[0].priority).toBe(5);
      expect(patterns[0].context).toEqual({ toolSequence: ['browser', 'clipboard'], occurrenceCount: 3 });
    });

    it('ignores single-tool tasks and order changes', async () => {
      const history = [
        ...[1, 2, 3, 4].map(() => makeTask({ toolsUsed: ['browser'] })),
        makeTask({ toolsUsed: ['a', 'b'] }),
        makeTask({ toolsUsed: ['b', 'a'] }),
        makeTask({ toolsUsed: ['a', 'b'] }),
      ];
      expect(ofType(await analyzerFor(history).analyze(NOW), 'automate-pattern')).toEqual([]);
    });
  });

  describe('missing capabilities', () => {
    it('groups unsupported requests by their leading text', async () => {
      const history = [
        failure('Tool not found: calendar', { request: 'Schedule a meeting with the team tomorrow' }),
        failure('Calendar is NOT SUPPORTED', { request: 'schedule a meeting with the team tomorrow' }),
      ];
      const capabilities = ofType(await analyzerFor(history).analyze(NOW), 'new-capability');

      expect(capabilities).toHaveLength(1);
      expect(capabilities[0].priority).toBe(7);
      expect(capabilities[0].context.requestCount).toBe(2);
    });
  });

  describe('ranking', () => {
    it('orders by priority and keeps detection order on ties', async () => {
      const history = [
        failure('Tool not found: calendar', { request: 'book a room' }),
        failure('Tool not found: calendar', { request: 'book a room' }),
        ...[1, 2, 3].map(() => makeTask({ toolsUsed: ['browser', 'clipboard'] })),
        ...[1, 2, 3, 4].map(() => failure('Disk full')),
      ];
      const found = await analyzerFor(history).analyze(NOW);

      expect(found.map((o) => `${o.type}:${o.priority}`)).toEqual([
        'fix-failure:9',
        'fix-failure:7',
        'new-capability:7',
        'automate-pattern:5',
      ]);
    });

    it('produces the same ids on every pass', async () => {
      const history = [1, 2, 3].map(() => failure('Permission denied'));
      const analyzer = analyzerFor(history);

      const first = (await analyzer.analyze(NOW)).map((o) => o.id);
      const second = (await analyzer.analyze(NOW + 1000)).map((o) => o.id);
      expect(first).toEqual(second);
      expect(first[0]).toMatch(/^fix-[0-9a-f]{12}$/);
    });

    it('top(n) returns the highest ranked opportunities', async () => {
      const history = [
        ...[1, 2, 3].map(() => makeTask({ toolsUsed: ['browser', 'clipboard'] })),
        ...[1, 2].map(() => failure('Disk full')),
      ];
      const top = await analyzerFor(history).top(1, NOW);
      expect(top.map((o) => o.type)).toEqual(['fix-failure']);
    });
  });
});
