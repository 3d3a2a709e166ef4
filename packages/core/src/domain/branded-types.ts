/**
 * Branded Types Module - Type-safe row identity with validation
 */

/**
 * Branded type utility
 *
 * @template T - Underlying primitive type
 * @template TBrand - Brand identifier
 *
 * @example
 * ```typescript
 * type RowId = Brand<string, 'RowId'>;
 *
 * const rowId: RowId = '3'; // ❌ Type error, use createRowId('3')
 * ```
 */
type Brand<T, TBrand> = T & { readonly __brand: TBrand };

/**
 * Row identifier
 *
 * Holds the row's position in the master table. It never depends on field values,
 * so an edited row always maps back to the master row it was read from.
 */
export type RowId = Brand<string, 'RowId'>;

/** Validation error thrown when ID creation fails */
export class IdValidationError extends Error {
  constructor(
    public readonly idType: string,
    public readonly value: string,
    message: string,
  ) {
    super(`[${idType}] ${message}: received "${value}"`);
    this.name = 'IdValidationError';
  }
}

/** @internal */
const isNonEmptyString = (value: string): boolean => {
  return value.trim() !== '';
};

/**
 * Creates a validated RowId
 *
 * @throws {IdValidationError} If id is empty or contains only whitespace
 *
 * @example
 * ```typescript
 * const rowId = createRowId('0');
 * createRowId(' '); // ❌ Throws IdValidationError
 * ```
 */
export const createRowId = (id: string): RowId => {
  if (!id || !isNonEmptyString(id)) {
    throw new IdValidationError('RowId', id, 'RowId cannot be empty or whitespace-only');
  }
  return id as RowId;
};

/** Creates the RowId for the row at a zero-based position in the master table */
export const rowIdFromIndex = (index: number): RowId => {
  if (!Number.isInteger(index) || index < 0) {
    throw new IdValidationError('RowId', String(index), 'RowId index must be a non-negative integer');
  }
  return String(index) as RowId;
};

/** Type guard for RowId */
export const isRowId = (value: unknown): value is RowId => {
  return typeof value === 'string' && isNonEmptyString(value);
};

/** Unwraps a RowId to its underlying string value */
export const unwrapId = (id: RowId): string => {
  return id as string;
};
