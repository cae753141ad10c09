/**
 * Error taxonomy for identifier assignment.
 *
 * Every error here is a caller input or configuration problem: it is thrown
 * immediately and the whole batch call fails with it.
 */

export type IdentityErrorCode =
  | 'UNRESOLVABLE_TYPE'
  | 'AMBIGUOUS_FIELD_NAME'
  | 'UNDEFINED_ORDER'
  | 'EMPTY_INPUT'
  | 'NON_UNIQUE_INDEX'
  | 'INVALID_POLICY'
  | 'INVALID_BATCH';

export class IdentityError extends Error {
  readonly code: IdentityErrorCode;
  readonly context: Record<string, unknown>;

  constructor(message: string, code: IdentityErrorCode, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'IdentityError';
    this.code = code;
    this.context = context;
  }
}

/**
 * A field's declared type does not match the shape of its value
 */
export class UnresolvableTypeError extends IdentityError {
  constructor(fieldName: string, declaredType: string, reason: string, context: Record<string, unknown> = {}) {
    super(`Cannot resolve field '${fieldName}' as ${declaredType}: ${reason}`, 'UNRESOLVABLE_TYPE', {
      fieldName,
      declaredType,
      ...context,
    });
    this.name = 'UnresolvableTypeError';
  }
}

/**
 * Two fields of one record hash under the same name
 */
export class AmbiguousFieldNameError extends IdentityError {
  constructor(hashedName: string, rawNames: string[], context: Record<string, unknown> = {}) {
    super(
      `Fields ${rawNames.map(n => JSON.stringify(n)).join(' and ')} both normalize to '${hashedName}'`,
      'AMBIGUOUS_FIELD_NAME',
      { hashedName, rawNames, ...context }
    );
    this.name = 'AmbiguousFieldNameError';
  }
}

export class UndefinedOrderError extends IdentityError {
  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(`Sequential identifiers need an explicit stable order: ${reason}`, 'UNDEFINED_ORDER', context);
    this.name = 'UndefinedOrderError';
  }
}

export class EmptyInputError extends IdentityError {
  constructor(context: Record<string, unknown> = {}) {
    super('Cannot digest zero-length canonical input', 'EMPTY_INPUT', context);
    this.name = 'EmptyInputError';
  }
}

export class NonUniqueIndexError extends IdentityError {
  constructor(ordinal: number, recordIndices: number[]) {
    super(
      `Ordinal ${ordinal} is carried by records ${recordIndices.join(', ')}`,
      'NON_UNIQUE_INDEX',
      { ordinal, recordIndices }
    );
    this.name = 'NonUniqueIndexError';
  }
}

export class PolicyError extends IdentityError {
  readonly issues: string[];

  constructor(issues: string[], context: Record<string, unknown> = {}) {
    super(`Invalid identity policy: ${issues.join(', ')}`, 'INVALID_POLICY', context);
    this.name = 'PolicyError';
    this.issues = issues;
  }
}

export class InvalidBatchError extends IdentityError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid batch: ${issues.join(', ')}`, 'INVALID_BATCH');
    this.name = 'InvalidBatchError';
    this.issues = issues;
  }
}
