import type { ProviderErrorKind } from '../../ai/errors';
import { ProviderError } from '../../ai/errors';

export interface CandidateFailure {
  model: string;
  error: unknown;
}

/** Every model candidate failed for one completion round. */
export class AllModelsExhaustedError extends Error {
  constructor(readonly failures: readonly CandidateFailure[]) {
    super(
      failures.length
        ? `All ${failures.length} model candidates failed; last error: ${describe(failures[failures.length - 1].error)}`
        : 'No model candidates configured'
    );
    this.name = 'AllModelsExhaustedError';
  }

  get lastCause(): unknown {
    return this.failures.length ? this.failures[this.failures.length - 1].error : undefined;
  }

  /** Per-candidate summary safe to return to clients. */
  attempts(): Array<{ model: string; kind: ProviderErrorKind | 'unknown'; message: string }> {
    return this.failures.map((f) => ({
      model: f.model,
      kind: f.error instanceof ProviderError ? f.error.kind : 'unknown',
      message: describe(f.error),
    }));
  }
}

export class HistoryValidationError extends Error {
  constructor(readonly details: string[]) {
    super(`Invalid conversation history: ${details.join('; ')}`);
    this.name = 'HistoryValidationError';
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
