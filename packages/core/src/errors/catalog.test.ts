import { describe, it, expect } from 'vitest'
import {
  ProtocolError,
  AttestationNotFoundError,
  AttestationRevokedError,
  AttestationExpiredError,
  SchemaMismatchError,
  RecipientMismatchError,
  IssuerMismatchError,
  DocumentMismatchError,
  InsufficientCapabilityError,
  IssuerNotRegisteredError,
  AlreadyReservedError,
  AlreadyClaimedError,
  NotReservedForCallerError,
  TokenNotFoundError,
  OnlyIssuerMayCancelError,
  LabelTooLargeError,
  SlotMismatchError,
  InsufficientValueError,
  InsufficientAllowanceError,
  NotAuthorizedError,
  TokenLockedError,
  AlreadyRevokedError,
  InvalidDelegationSignatureError,
  ContractPausedError,
  MissingRoleError,
} from './catalog.js'

describe('ProtocolError', () => {
  it('has correct code, errorCode, message, and details', () => {
    const err = new ProtocolError(400, 'BAD_REQUEST', 'Bad request', { reason: 'test' })

    expect(err.code).toBe(400)
    expect(err.errorCode).toBe('BAD_REQUEST')
    expect(err.message).toBe('Bad request')
    expect(err.details).toEqual({ reason: 'test' })
  })

  it('toJSON() returns serializable object and omits absent details', () => {
    const err = new ProtocolError(400, 'BAD_REQUEST', 'Bad request', { field: 'name' })
    expect(err.toJSON()).toEqual({
      error: {
        code: 400,
        errorCode: 'BAD_REQUEST',
        message: 'Bad request',
        details: { field: 'name' },
      },
    })

    expect(new ProtocolError(400, 'BAD_REQUEST', 'Bad request').toJSON()).toEqual({
      error: { code: 400, errorCode: 'BAD_REQUEST', message: 'Bad request' },
    })
  })

  it('every failure kind has its own status and error code', () => {
    const cases: Array<{
      Cls: new (d?: Record<string, unknown>) => ProtocolError
      code: number
      errorCode: string
    }> = [
      { Cls: AttestationNotFoundError, code: 404, errorCode: 'ATTESTATION_NOT_FOUND' },
      { Cls: AttestationRevokedError, code: 403, errorCode: 'ATTESTATION_REVOKED' },
      { Cls: AttestationExpiredError, code: 403, errorCode: 'ATTESTATION_EXPIRED' },
      { Cls: SchemaMismatchError, code: 403, errorCode: 'SCHEMA_MISMATCH' },
      { Cls: RecipientMismatchError, code: 403, errorCode: 'RECIPIENT_MISMATCH' },
      { Cls: IssuerMismatchError, code: 403, errorCode: 'ISSUER_MISMATCH' },
      { Cls: DocumentMismatchError, code: 403, errorCode: 'DOCUMENT_MISMATCH' },
      { Cls: InsufficientCapabilityError, code: 403, errorCode: 'INSUFFICIENT_CAPABILITY' },
      { Cls: IssuerNotRegisteredError, code: 409, errorCode: 'ISSUER_NOT_REGISTERED' },
      { Cls: AlreadyReservedError, code: 409, errorCode: 'ALREADY_RESERVED' },
      { Cls: AlreadyClaimedError, code: 409, errorCode: 'ALREADY_CLAIMED' },
      { Cls: NotReservedForCallerError, code: 403, errorCode: 'NOT_RESERVED_FOR_CALLER' },
      { Cls: TokenNotFoundError, code: 404, errorCode: 'TOKEN_NOT_FOUND' },
      { Cls: OnlyIssuerMayCancelError, code: 403, errorCode: 'ONLY_ISSUER_MAY_CANCEL' },
      { Cls: LabelTooLargeError, code: 413, errorCode: 'LABEL_TOO_LARGE' },
      { Cls: SlotMismatchError, code: 422, errorCode: 'SLOT_MISMATCH' },
      { Cls: InsufficientValueError, code: 422, errorCode: 'INSUFFICIENT_VALUE' },
      { Cls: InsufficientAllowanceError, code: 403, errorCode: 'INSUFFICIENT_ALLOWANCE' },
      { Cls: NotAuthorizedError, code: 403, errorCode: 'NOT_AUTHORIZED' },
      { Cls: TokenLockedError, code: 423, errorCode: 'TOKEN_LOCKED' },
      { Cls: AlreadyRevokedError, code: 409, errorCode: 'ALREADY_REVOKED' },
      { Cls: InvalidDelegationSignatureError, code: 401, errorCode: 'INVALID_DELEGATION_SIGNATURE' },
      { Cls: ContractPausedError, code: 503, errorCode: 'CONTRACT_PAUSED' },
      { Cls: MissingRoleError, code: 403, errorCode: 'MISSING_ROLE' },
    ]

    for (const { Cls, code, errorCode } of cases) {
      const err = new Cls()
      expect(err).toBeInstanceOf(ProtocolError)
      expect(err).toBeInstanceOf(Error)
      expect(err.code).toBe(code)
      expect(err.errorCode).toBe(errorCode)
    }

    const codes = new Set(cases.map((c) => c.errorCode))
    expect(codes.size).toBe(cases.length)
  })

  it('error name property is set to the class name', () => {
    expect(new ProtocolError(400, 'X', 'x').name).toBe('ProtocolError')
    expect(new AlreadyClaimedError().name).toBe('AlreadyClaimedError')
    expect(new SlotMismatchError().name).toBe('SlotMismatchError')
    expect(new TokenLockedError().name).toBe('TokenLockedError')
  })
})
