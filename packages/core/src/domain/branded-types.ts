/**
 * Branded Types Module - Type-safe job identifiers with validation
 */

/**
 * Branded type utility
 *
 * @template T - Underlying primitive type (e.g., string, number)
 * @template TBrand - Brand identifier (e.g., 'JobId')
 *
 * @example
 * ```typescript
 * type JobId = Brand<string, 'JobId'>;
 *
 * const jobId: JobId = 'farequote'; // ❌ Type error, use createJobId()
 * ```
 */
type Brand<T, TBrand> = T & { readonly __brand: TBrand };

/** Identifier of the analysis job that owns a result or state document */
export type JobId = Brand<string, 'JobId'>;

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
 * Creates a validated JobId
 *
 * @throws {IdValidationError} If id is empty or contains only whitespace
 *
 * @example
 * ```typescript
 * const jobId = createJobId('farequote');
 * createJobId('  '); // ❌ Throws IdValidationError
 * ```
 */
export const createJobId = (id: string): JobId => {
  if (!id || !isNonEmptyString(id)) {
    throw new IdValidationError('JobId', id, 'JobId cannot be empty or whitespace-only');
  }
  return id as JobId;
};
