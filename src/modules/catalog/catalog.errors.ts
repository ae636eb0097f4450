import { HttpStatus } from '../../config/constants.js';
import type { EntityKindType } from '../../config/constants.js';

export type CatalogErrorKind = 'ValidationError' | 'StoreError' | 'TimeoutError';

// Batch-level problems (malformed envelope) are reported against the batch itself
export type ErrorEntity = EntityKindType | 'Batch';

export type StoreErrorCode =
  | 'DUPLICATE_KEY'
  | 'WRITE_CONFLICT'
  | 'FOREIGN_KEY'
  | 'SCHEMA_REJECTED'
  | 'STORE_FAILURE';

/**
 * Position of the offending record within its list in the batch.
 */
export interface RecordLocation {
  index?: number;
  ref?: string;
}

export interface CatalogErrorJson {
  kind: CatalogErrorKind;
  code: string;
  message: string;
  retryable: boolean;
  entity?: ErrorEntity;
  index?: number;
  ref?: string;
  field?: string;
  reason?: string;
  timeoutMs?: number;
}

/**
 * Base class for every failure a load reports back to its caller.
 */
export abstract class CatalogError extends Error {
  abstract readonly kind: CatalogErrorKind;

  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly retryable: boolean
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): CatalogErrorJson {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

const describeRecord = (entity: ErrorEntity, location: RecordLocation): string => {
  if (location.ref !== undefined) {
    return `${entity} "${location.ref}"`;
  }
  if (location.index !== undefined) {
    return `${entity}[${location.index}]`;
  }
  return entity;
};

/**
 * Field or reference problem in the submitted batch. The caller fixes the input.
 */
export class ValidationError extends CatalogError {
  readonly kind = 'ValidationError' as const;
  public readonly index?: number;
  public readonly ref?: string;

  constructor(
    public readonly entity: ErrorEntity,
    public readonly field: string,
    public readonly reason: string,
    location: RecordLocation = {}
  ) {
    super(
      `${describeRecord(entity, location)}.${field}: ${reason}`,
      'VALIDATION_ERROR',
      HttpStatus.UNPROCESSABLE_ENTITY,
      false
    );
    this.index = location.index;
    this.ref = location.ref;
  }

  override toJSON(): CatalogErrorJson {
    return {
      ...super.toJSON(),
      entity: this.entity,
      index: this.index,
      ref: this.ref,
      field: this.field,
      reason: this.reason,
    };
  }
}

/**
 * Rejected by the store, or conflicting with what the store already holds.
 */
export class StoreError extends CatalogError {
  readonly kind = 'StoreError' as const;
  public readonly entity?: ErrorEntity;
  public readonly field?: string;
  public readonly index?: number;
  public readonly ref?: string;

  constructor(
    message: string,
    code: StoreErrorCode,
    details: { entity?: ErrorEntity; field?: string } & RecordLocation = {}
  ) {
    super(
      message,
      code,
      code === 'STORE_FAILURE' || code === 'SCHEMA_REJECTED'
        ? HttpStatus.INTERNAL_SERVER_ERROR
        : HttpStatus.CONFLICT,
      code !== 'SCHEMA_REJECTED'
    );
    this.entity = details.entity;
    this.field = details.field;
    this.index = details.index;
    this.ref = details.ref;
  }

  static duplicateKey(entity: ErrorEntity, field: string, location: RecordLocation = {}): StoreError {
    const subject = location.index === undefined && location.ref === undefined
      ? entity
      : describeRecord(entity, location);
    return new StoreError(`${subject}: a record with this ${field} already exists`, 'DUPLICATE_KEY', {
      entity,
      field,
      ...location,
    });
  }

  static foreignKey(entity: ErrorEntity, field: string, id: number): StoreError {
    return new StoreError(`${entity}.${field}: referenced id ${id} does not exist`, 'FOREIGN_KEY', {
      entity,
      field,
    });
  }

  static writeConflict(message = 'Transaction aborted by a concurrent write'): StoreError {
    return new StoreError(message, 'WRITE_CONFLICT');
  }

  static failure(message: string): StoreError {
    return new StoreError(message, 'STORE_FAILURE');
  }

  override toJSON(): CatalogErrorJson {
    return {
      ...super.toJSON(),
      entity: this.entity,
      index: this.index,
      ref: this.ref,
      field: this.field,
    };
  }
}

/**
 * The transaction outlived its allotted time and was rolled back.
 */
export class TimeoutError extends CatalogError {
  readonly kind = 'TimeoutError' as const;

  constructor(public readonly timeoutMs: number) {
    super(
      `Transaction exceeded ${timeoutMs}ms and was rolled back`,
      'TRANSACTION_TIMEOUT',
      HttpStatus.GATEWAY_TIMEOUT,
      true
    );
  }

  override toJSON(): CatalogErrorJson {
    return { ...super.toJSON(), timeoutMs: this.timeoutMs };
  }
}

export type CatalogViolation = ValidationError | StoreError;

export type LoadError = ValidationError | StoreError | TimeoutError;

/**
 * Anything thrown while persisting becomes a structured load error.
 */
export const toLoadError = (error: unknown): StoreError | TimeoutError => {
  if (error instanceof StoreError || error instanceof TimeoutError) {
    return error;
  }
  const message = error instanceof Error ? error.message : 'Unknown store failure';
  return StoreError.failure(message);
};
