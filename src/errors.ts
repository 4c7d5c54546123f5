export type ScoringErrorCode = 'INVALID_INPUT';

export class ScoringError extends Error {
  constructor(
    message: string,
    public readonly code: ScoringErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ScoringError';
  }
}

export type PipelineErrorCode = 'STORAGE_FAILED' | 'RENDER_FAILED';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Accept a text field from an article record. Missing values read as ''.
 * Anything else that is not a string means the caller broke the contract, so it throws.
 */
export function textField(value: unknown, field: string): string {
  if (value === null || value === undefined) return '';
  if (typeof value !== 'string') {
    throw new ScoringError(`Expected ${field} to be a string, got ${typeof value}`, 'INVALID_INPUT', {
      field,
      type: typeof value,
    });
  }
  return value;
}
