export type QueryStateErrorCode = 'already_executed' | 'missing_configuration';

/**
 * Raised when a QueryBuilder is used outside its single-use lifecycle:
 * reconfigured or executed again after execution, or executed before
 * source, params and registry were all supplied.
 */
export class QueryStateError extends Error {
  override readonly name = 'QueryStateError';

  constructor(
    readonly code: QueryStateErrorCode,
    message: string,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised only under the 'reject' value policy, when a filter value cannot be
 * parsed into the type of its registered field.
 */
export class FilterValueError extends Error {
  override readonly name = 'FilterValueError';

  constructor(
    readonly field: string,
    readonly operator: string,
    readonly value: string,
    message?: string,
  ) {
    super(message ?? `Invalid value "${value}" for filter ${field}[${operator}]`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueryCancelledError extends Error {
  override readonly name = 'QueryCancelledError';

  constructor(override readonly cause?: unknown) {
    super('Query execution was cancelled');
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SourceError extends Error {
  override readonly name = 'SourceError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
