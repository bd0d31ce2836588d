/**
 * BOM processing errors
 * Reported once at the request boundary, never per row
 */

export type BomErrorCode =
  | 'MISSING_ROOT'
  | 'AMBIGUOUS_ROOT'
  | 'MALFORMED_QUANTITY'
  | 'MISSING_COLUMN'
  | 'INVALID_INPUT'
  | 'PATH_LIMIT_EXCEEDED'
  | 'BOM_NOT_FOUND';

const STATUS_BY_CODE: Record<BomErrorCode, number> = {
  MISSING_ROOT: 422,
  AMBIGUOUS_ROOT: 422,
  MALFORMED_QUANTITY: 422,
  MISSING_COLUMN: 400,
  INVALID_INPUT: 400,
  PATH_LIMIT_EXCEEDED: 422,
  BOM_NOT_FOUND: 404
};

/**
 * @example
 * throw new BomError('MISSING_ROOT', 'No root item found (no row with level 0)');
 */
export class BomError extends Error {
  readonly name = 'BomError' as const;
  readonly code: BomErrorCode;
  readonly statusCode: number;
  readonly details: unknown;

  constructor(code: BomErrorCode, message: string, details: unknown = null) {
    super(message);
    this.code = code;
    this.statusCode = STATUS_BY_CODE[code];
    this.details = details;
    Object.setPrototypeOf(this, BomError.prototype);
  }
}

export function isBomError(error: unknown): error is BomError {
  return error instanceof BomError;
}

export interface MalformedQuantityDetail {
  /** 1-based data row */
  row: number;
  value: string;
}
