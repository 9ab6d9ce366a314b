export type NettingErrorCode =
  | 'invalid_intent'
  | 'invalid_netting_config'
  | 'amount_overflow'
  | 'netting_invariant_violated'
  | 'exploration_limit_exceeded';

export class NettingError extends Error {
  readonly code: NettingErrorCode;
  readonly details?: unknown;

  constructor(opts: { code: NettingErrorCode; message: string; details?: unknown }) {
    super(opts.message);
    this.name = 'NettingError';
    this.code = opts.code;
    this.details = opts.details;
  }
}

export class InvalidIntentError extends NettingError {
  readonly index: number | null;

  constructor(opts: { message: string; index?: number | null; details?: unknown }) {
    super({ code: 'invalid_intent', message: opts.message, details: opts.details });
    this.name = 'InvalidIntentError';
    this.index = opts.index ?? null;
  }
}

export class InvalidNettingConfigError extends NettingError {
  constructor(message: string, details?: unknown) {
    super({ code: 'invalid_netting_config', message, details });
    this.name = 'InvalidNettingConfigError';
  }
}

export class AmountOverflowError extends NettingError {
  constructor(message: string, details?: unknown) {
    super({ code: 'amount_overflow', message, details });
    this.name = 'AmountOverflowError';
  }
}

// Raised only when the calculator and applier disagree; never an input condition.
export class NettingInvariantError extends NettingError {
  constructor(message: string, details?: unknown) {
    super({ code: 'netting_invariant_violated', message, details });
    this.name = 'NettingInvariantError';
  }
}

export type ExplorationLimitReason = 'max_cycles' | 'timeout';

export class ExplorationLimitError extends NettingError {
  readonly reason: ExplorationLimitReason;

  constructor(reason: ExplorationLimitReason, details?: unknown) {
    super({
      code: 'exploration_limit_exceeded',
      message: reason === 'timeout'
        ? 'exploration limit exceeded: cycle enumeration deadline passed'
        : 'exploration limit exceeded: too many cycles enumerated',
      details
    });
    this.name = 'ExplorationLimitError';
    this.reason = reason;
  }
}
