import { HttpException, HttpStatus, Logger } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';

export type ConstraintViolationKind = 'unique' | 'foreign_key' | 'check' | 'not_null';

// SQLSTATE class 23 codes (Postgres) and extended result codes (SQLite).
const DRIVER_CODES: Record<string, ConstraintViolationKind> = {
  '23505': 'unique',
  '23503': 'foreign_key',
  '23514': 'check',
  '23502': 'not_null',
  SQLITE_CONSTRAINT_UNIQUE: 'unique',
  SQLITE_CONSTRAINT_PRIMARYKEY: 'unique',
  SQLITE_CONSTRAINT_FOREIGNKEY: 'foreign_key',
  // SQLite reports deletes blocked by ON DELETE RESTRICT under this code.
  SQLITE_CONSTRAINT_TRIGGER: 'foreign_key',
  SQLITE_CONSTRAINT_CHECK: 'check',
  SQLITE_CONSTRAINT_NOTNULL: 'not_null',
};

const STATUS_BY_KIND: Record<ConstraintViolationKind, HttpStatus> = {
  unique: HttpStatus.CONFLICT,
  foreign_key: HttpStatus.CONFLICT,
  check: HttpStatus.BAD_REQUEST,
  not_null: HttpStatus.BAD_REQUEST,
};

const MESSAGE_BY_KIND: Record<ConstraintViolationKind, string> = {
  unique: 'A record with the same unique value already exists',
  foreign_key: 'The operation conflicts with a related record',
  check: 'The record violates a check constraint',
  not_null: 'A required value is missing',
};

export class ConstraintViolationException extends HttpException {
  constructor(
    readonly kind: ConstraintViolationKind,
    readonly detail?: string,
  ) {
    super(
      {
        statusCode: STATUS_BY_KIND[kind],
        error: kind,
        message: MESSAGE_BY_KIND[kind],
        detail,
      },
      STATUS_BY_KIND[kind],
    );
  }
}

function driverCode(error: QueryFailedError): string | undefined {
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) return undefined;
  if (!('code' in driverError) || typeof driverError.code !== 'string') return undefined;
  return driverError.code;
}

function driverDetail(error: QueryFailedError): string {
  const driverError: unknown = error.driverError;
  if (typeof driverError === 'object' && driverError !== null) {
    if ('detail' in driverError && typeof driverError.detail === 'string') return driverError.detail;
    if ('constraint' in driverError && typeof driverError.constraint === 'string') return driverError.constraint;
  }
  return error.message;
}

export function classifyConstraintViolation(error: unknown): ConstraintViolationKind | undefined {
  if (!(error instanceof QueryFailedError)) return undefined;
  const code = driverCode(error);
  return code === undefined ? undefined : DRIVER_CODES[code];
}

const logger = new Logger('ConstraintViolation');

/**
 * Use as a `.catch()` handler on writes: constraint failures become a
 * `ConstraintViolationException`, anything else is rethrown untouched.
 */
export function rethrowConstraintViolation(error: unknown): never {
  const kind = classifyConstraintViolation(error);
  if (kind && error instanceof QueryFailedError) {
    const detail = driverDetail(error);
    logger.warn(`${kind} violation: ${detail}`);
    throw new ConstraintViolationException(kind, detail);
  }
  throw error;
}
