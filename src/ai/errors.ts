/**
 * Error kinds raised by the decision core.
 * Only InvalidStateError and NoCandidatesError ever reach the engine.
 */
export type AIErrorCode =
  | 'INVALID_STATE'
  | 'NO_CANDIDATES'
  | 'BUDGET_EXHAUSTED'
  | 'PERSISTENCE_UNAVAILABLE';

export class AIError extends Error {
  public readonly code: AIErrorCode;

  constructor(message: string, code: AIErrorCode, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (options?.cause) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidStateError extends AIError {
  constructor(message: string) {
    super(message, 'INVALID_STATE');
  }
}

export class NoCandidatesError extends AIError {
  constructor(message: string = 'No candidate words to choose from') {
    super(message, 'NO_CANDIDATES');
  }
}

export class BudgetExhaustedError extends AIError {
  constructor(message: string = 'Search budget produced no completed rollouts') {
    super(message, 'BUDGET_EXHAUSTED');
  }
}

export class PersistenceUnavailableError extends AIError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PERSISTENCE_UNAVAILABLE', { cause });
  }
}

export const ensureError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
