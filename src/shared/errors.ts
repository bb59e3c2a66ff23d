export type ErrorCode =
  | 'MALFORMED_IDENTIFIER'
  | 'UNKNOWN_SPECIES'
  | 'UNKNOWN_ENERGY_LABEL'
  | 'INVALID_PARAMS'
  | 'INTERNAL_ERROR';

export interface LinesErrorPayload {
  code: ErrorCode;
  message: string;
  data?: unknown;
}

function hasData(data: unknown): boolean {
  if (data === undefined) return false;
  return !(typeof data === 'object' && data !== null && Object.keys(data).length === 0);
}

export class LinesError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public data?: unknown
  ) {
    super(message);
    this.name = 'LinesError';
  }

  /** Wire form; `data` is left out when it is absent or an empty object. */
  toJSON(): LinesErrorPayload {
    return {
      code: this.code,
      message: this.message,
      ...(hasData(this.data) ? { data: this.data } : {}),
    };
  }
}

export function malformedIdentifier(message: string, data?: unknown): LinesError {
  return new LinesError('MALFORMED_IDENTIFIER', message, data);
}

export function unknownSpecies(message: string, data?: unknown): LinesError {
  return new LinesError('UNKNOWN_SPECIES', message, data);
}

export function unknownEnergyLabel(message: string, data?: unknown): LinesError {
  return new LinesError('UNKNOWN_ENERGY_LABEL', message, data);
}

export function invalidParams(message: string, data?: unknown): LinesError {
  return new LinesError('INVALID_PARAMS', message, data);
}

export function internalError(message: string, data?: unknown): LinesError {
  return new LinesError('INTERNAL_ERROR', message, data);
}

export function isLinesError(err: unknown): err is LinesError {
  return err instanceof LinesError;
}

/** Any thrown value as a `LinesError`; foreign errors become `INTERNAL_ERROR`. */
export function toLinesError(err: unknown): LinesError {
  if (isLinesError(err)) return err;
  return internalError(err instanceof Error ? err.message : String(err));
}
