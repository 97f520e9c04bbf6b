import { describe, it, expect, vi } from 'vitest';
import { orderCandidates, runWithFallback, toCandidates } from '../../../src/services/chat';

describe('toCandidates / orderCandidates', () => {
  it('assigns priority by list position', () => {
    expect(toCandidates(['a', 'b', 'c'])).toEqual([
      { identifier: 'a', priority: 0 },
      { identifier: 'b', priority: 1 },
      { identifier: 'c', priority: 2 },
    ]);
  });

  it('orders by priority without touching the input', () => {
    const input = [
      { identifier: 'late', priority: 5 },
      { identifier: 'early', priority: 1 },
    ];
    const ordered = orderCandidates(input);
    expect(ordered.map((c) => c.identifier)).toEqual(['early', 'late']);
    expect(input[0].identifier).toBe('late');
  });
});

describe('runWithFallback', () => {
  const candidates = toCandidates(['m1', 'm2', 'm3']);

  it('stops at the first candidate that resolves', async () => {
    const attempt = vi.fn(async (c: { identifier: string }) => `ok:${c.identifier}`);
    const outcome = await runWithFallback(candidates, attempt);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value).toBe('ok:m1');
    expect(outcome.candidate.identifier).toBe('m1');
    expect(outcome.failures).toEqual([]);
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('advances past every kind of failure, in order', async () => {
    const seen: string[] = [];
    const outcome = await runWithFallback(candidates, async (c) => {
      seen.push(c.identifier);
      if (c.identifier === 'm1') throw new Error('timeout');
      if (c.identifier === 'm2') throw new TypeError('bad request shape');
      return 'third time';
    });

    expect(seen).toEqual(['m1', 'm2', 'm3']);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.candidate.identifier).toBe('m3');
    expect(outcome.failures.map((f) => f.model)).toEqual(['m1', 'm2']);
  });

  it('reports every failure when all candidates fail', async () => {
    const onFailure = vi.fn();
    const outcome = await runWithFallback(
      candidates,
      async (c) => {
        throw new Error(`${c.identifier} down`);
      },
      onFailure
    );

    expect(outcome.ok).toBe(false);
    expect(outcome.failures.map((f) => (f.error instanceof Error ? f.error.message : ''))).toEqual([
      'm1 down',
      'm2 down',
      'm3 down',
    ]);
    expect(onFailure.mock.calls.map(([, remaining]) => remaining)).toEqual([2, 1, 0]);
  });

  it('returns an empty failure list for an empty candidate list', async () => {
    const outcome = await runWithFallback([], async () => 'never');
    expect(outcome).toEqual({ ok: false, failures: [] });
  });
});
