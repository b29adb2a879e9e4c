export enum VariantErrorCode {
  MISSING_SEEDS = 'MISSING_SEEDS',
  UNKNOWN_VARIANT = 'UNKNOWN_VARIANT',
}

export class VariantEngineError extends Error {
  constructor(
    public code: VariantErrorCode,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'VariantEngineError';
  }
}

/** The caller passed no seed sequence at all. A programming error, never retried. */
export class MergePreconditionError extends VariantEngineError {
  constructor(message = 'seeds must be provided') {
    super(VariantErrorCode.MISSING_SEEDS, message);
    this.name = 'MergePreconditionError';
  }
}

export class VariantNotFoundError extends VariantEngineError {
  constructor(label: string, available: string[]) {
    super(VariantErrorCode.UNKNOWN_VARIANT, `Card has no "${label}" variant`, { label, available });
    this.name = 'VariantNotFoundError';
  }
}
