/**
 * CRM error taxonomy.
 *
 * Lookups and "update if exists" operations return null on a miss;
 * these errors are reserved for operations that need a valid reference
 * or reject a value outright.
 */

export class CRMError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'CRMError';
  }
}

export class DuplicateEmailError extends CRMError {
  constructor(
    public readonly email: string,
    public readonly existingId?: string,
    cause?: unknown
  ) {
    super(
      existingId
        ? `Contact with email '${email}' already exists (id=${existingId})`
        : `Contact with email '${email}' already exists`,
      'DUPLICATE_EMAIL',
      cause
    );
    this.name = 'DuplicateEmailError';
  }
}

export type EntityKind = 'contact' | 'deal' | 'activity';

export class NotFoundError extends CRMError {
  constructor(
    public readonly entity: EntityKind,
    public readonly id: string
  ) {
    super(`${entity.charAt(0).toUpperCase()}${entity.slice(1)} ${id} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class InvalidValueError extends CRMError {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    reason?: string
  ) {
    super(
      `Invalid value for ${field}: ${JSON.stringify(value) ?? String(value)}${reason ? ` (${reason})` : ''}`,
      'INVALID_VALUE'
    );
    this.name = 'InvalidValueError';
  }
}
