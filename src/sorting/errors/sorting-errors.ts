export type SortingErrorCode = 'INVALID_INPUT' | 'INVALID_ARGUMENTS';

export interface InputViolation {
  field: string;
  value: unknown;
  constraints: string[];
}

export interface SortingErrorDetails {
  violations?: InputViolation[];
  received?: unknown;
}

export class SortingError extends Error {
  constructor(
    public readonly code: SortingErrorCode,
    message: string,
    public readonly details: SortingErrorDetails = {},
  ) {
    super(message);
    this.name = 'SortingError';
  }
}

export function isSortingError(err: unknown): err is SortingError {
  return err instanceof SortingError;
}
