/**
 * Error classes shared across the dealcheck services.
 *
 * Every error carries a stable `code` so logs and run records can be
 * grouped without parsing messages.
 */

import { DatabaseError } from 'pg'
import type { PriceSnapshot } from './types'

export class DealcheckError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * A foreign key, CHECK or uniqueness constraint rejected a write.
 */
export class ConstraintViolationError extends DealcheckError {
  readonly constraint: string | null

  constructor(message: string, constraint: string | null = null, options?: { cause?: unknown }) {
    super('CONSTRAINT_VIOLATION', message, options)
    this.constraint = constraint
  }
}

/**
 * A snapshot already exists for this (raw product, scraped_at).
 * Benign: the caller counts it as deduplicated.
 */
export class DuplicateSnapshotError extends DealcheckError {
  readonly existing: PriceSnapshot | null

  constructor(productRawId: number, scrapedAt: Date, existing: PriceSnapshot | null = null) {
    super(
      'DUPLICATE_SNAPSHOT',
      `Snapshot already recorded for raw product ${productRawId} at ${scrapedAt.toISOString()}`
    )
    this.existing = existing
  }
}

export class NotFoundError extends DealcheckError {
  constructor(entity: string, id: number | string) {
    super('NOT_FOUND', `${entity} ${id} not found`)
  }
}

export const SNAPSHOT_UNIQUE_CONSTRAINT = 'price_snapshots_raw_scraped_key'

// PostgreSQL SQLSTATE codes
const PG_UNIQUE_VIOLATION = '23505'
const PG_FOREIGN_KEY_VIOLATION = '23503'
const PG_CHECK_VIOLATION = '23514'
const PG_NOT_NULL_VIOLATION = '23502'

export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  return (
    error instanceof DatabaseError &&
    error.code === PG_UNIQUE_VIOLATION &&
    (constraint === undefined || error.constraint === constraint)
  )
}

/**
 * Translate a pg driver error into a DealcheckError. Errors that are not
 * constraint violations are returned unchanged.
 */
export function mapPgError(error: unknown): unknown {
  if (!(error instanceof DatabaseError)) return error

  switch (error.code) {
    case PG_UNIQUE_VIOLATION:
    case PG_FOREIGN_KEY_VIOLATION:
    case PG_CHECK_VIOLATION:
    case PG_NOT_NULL_VIOLATION:
      return new ConstraintViolationError(error.detail ?? error.message, error.constraint ?? null, {
        cause: error,
      })
    default:
      return error
  }
}
