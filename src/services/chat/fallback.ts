import type { ModelCandidate } from '../../types';
import type { CandidateFailure } from './errors';

export type FallbackOutcome<T> =
  | { ok: true; value: T; candidate: ModelCandidate; failures: readonly CandidateFailure[] }
  | { ok: false; failures: readonly CandidateFailure[] };

export type FailureListener = (failure: CandidateFailure, remaining: number) => void;

/** Candidates ordered by priority, ties kept in list order. Built once per configuration. */
export function toCandidates(models: readonly string[]): readonly ModelCandidate[] {
  return Object.freeze(models.map((identifier, priority) => Object.freeze({ identifier, priority })));
}

export function orderCandidates(candidates: readonly ModelCandidate[]): readonly ModelCandidate[] {
  return Object.freeze([...candidates].sort((a, b) => a.priority - b.priority));
}

/**
 * Tries each candidate once, in the given order, until one resolves.
 * Any rejection advances to the next candidate; transient and permanent
 * provider errors are not distinguished here.
 */
export async function runWithFallback<T>(
  candidates: readonly ModelCandidate[],
  attempt: (candidate: ModelCandidate) => Promise<T>,
  onFailure?: FailureListener
): Promise<FallbackOutcome<T>> {
  const failures: CandidateFailure[] = [];
  for (const [index, candidate] of candidates.entries()) {
    try {
      const value = await attempt(candidate);
      return { ok: true, value, candidate, failures };
    } catch (error) {
      const failure = { model: candidate.identifier, error };
      failures.push(failure);
      onFailure?.(failure, candidates.length - index - 1);
    }
  }
  return { ok: false, failures };
}
