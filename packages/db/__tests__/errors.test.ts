import { describe, it, expect } from 'vitest'
import { DatabaseError } from 'pg'
import {
  ConstraintViolationError,
  DealcheckError,
  DuplicateSnapshotError,
  isUniqueViolation,
  mapPgError,
  SNAPSHOT_UNIQUE_CONSTRAINT,
} from '../errors'

function pgError(code: string, constraint?: string, detail?: string): DatabaseError {
  const error = new DatabaseError('violates constraint', 0, 'error')
  error.code = code
  error.constraint = constraint
  error.detail = detail
  return error
}

describe('mapPgError', () => {
  it('maps foreign key violations to ConstraintViolationError', () => {
    const mapped = mapPgError(
      pgError('23503', 'discount_evaluations_snapshot_id_fkey', 'Key (snapshot_id)=(9) is not present.')
    )

    expect(mapped).toBeInstanceOf(ConstraintViolationError)
    expect(mapped).toMatchObject({
      code: 'CONSTRAINT_VIOLATION',
      constraint: 'discount_evaluations_snapshot_id_fkey',
      message: 'Key (snapshot_id)=(9) is not present.',
    })
  })

  it('maps CHECK violations and keeps the driver error as cause', () => {
    const original = pgError('23514', 'discount_evaluations_label_check')
    const mapped = mapPgError(original)

    expect(mapped).toBeInstanceOf(ConstraintViolationError)
    expect(mapped instanceof Error ? mapped.cause : undefined).toBe(original)
  })

  it('returns other errors unchanged', () => {
    const timeout = pgError('57014')
    const plain = new Error('socket hang up')

    expect(mapPgError(timeout)).toBe(timeout)
    expect(mapPgError(plain)).toBe(plain)
  })
})

describe('isUniqueViolation', () => {
  it('matches the constraint name when given', () => {
    const error = pgError('23505', SNAPSHOT_UNIQUE_CONSTRAINT)

    expect(isUniqueViolation(error)).toBe(true)
    expect(isUniqueViolation(error, SNAPSHOT_UNIQUE_CONSTRAINT)).toBe(true)
    expect(isUniqueViolation(error, 'retailers_domain_key')).toBe(false)
    expect(isUniqueViolation(new Error('23505'))).toBe(false)
  })
})

describe('DealcheckError subclasses', () => {
  it('carry their class name and code', () => {
    const error = new DuplicateSnapshotError(4, new Date('2026-03-01T10:00:00Z'))

    expect(error).toBeInstanceOf(DealcheckError)
    expect(error.name).toBe('DuplicateSnapshotError')
    expect(error.code).toBe('DUPLICATE_SNAPSHOT')
    expect(error.message).toBe('Snapshot already recorded for raw product 4 at 2026-03-01T10:00:00.000Z')
    expect(error.existing).toBeNull()
  })
})
