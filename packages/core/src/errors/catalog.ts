/**
 * Typed error catalog. Every failure the ledger can report is a distinct
 * subclass so callers can tell a retryable condition (expired attestation)
 * from a fatal one (already claimed) or a wrong signer (issuer mismatch).
 */

export class ProtocolError extends Error {
  constructor(
    public readonly code: number,
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// 401 — Request authentication

export class MissingAuthError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(401, "MISSING_AUTH", "Missing authentication", details);
  }
}

export class InvalidSignatureError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(401, "INVALID_SIGNATURE", "Invalid signature", details);
  }
}

export class ExpiredTokenError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(401, "EXPIRED_TOKEN", "Token has expired", details);
  }
}

// Attestation verification

export class AttestationNotFoundError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(404, "ATTESTATION_NOT_FOUND", "Attestation not found", details);
  }
}

export class AttestationRevokedError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(403, "ATTESTATION_REVOKED", "Attestation has been revoked", details);
  }
}

export class AttestationExpiredError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(403, "ATTESTATION_EXPIRED", "Attestation has expired", details);
  }
}

export class SchemaMismatchError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(403, "SCHEMA_MISMATCH", "Attestation schema mismatch", details);
  }
}

export class RecipientMismatchError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(403, "RECIPIENT_MISMATCH", "Caller is not the attestation recipient", details);
  }
}

export class IssuerMismatchError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(403, "ISSUER_MISMATCH", "Attestation issuer is not the document issuer", details);
  }
}

export class DocumentMismatchError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(403, "DOCUMENT_MISMATCH", "Attestation is for a different document", details);
  }
}

export class InsufficientCapabilityError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(403, "INSUFFICIENT_CAPABILITY", "Capability not granted", details);
  }
}

export class IssuerNotRegisteredError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(409, "ISSUER_NOT_REGISTERED", "No issuer registered for document", details);
  }
}

export class MalformedAttestationError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(422, "MALFORMED_ATTESTATION", "Attestation payload could not be decoded", details);
  }
}

export class AttestationUnavailableError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(502, "ATTESTATION_UNAVAILABLE", "Attestation service unavailable", details);
  }
}

// Reservation / claim lifecycle

export class AlreadyReservedError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(409, "ALREADY_RESERVED", "Token already reserved", details);
  }
}

export class AlreadyClaimedError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(409, "ALREADY_CLAIMED", "Token already claimed", details);
  }
}

export class NotReservedForCallerError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(403, "NOT_RESERVED_FOR_CALLER", "Reservation belongs to another recipient", details);
  }
}

export class TokenNotFoundError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(404, "TOKEN_NOT_FOUND", "Token not found", details);
  }
}

export class OnlyIssuerMayCancelError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(403, "ONLY_ISSUER_MAY_CANCEL", "Only the document issuer may cancel", details);
  }
}

export class LabelTooLargeError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(413, "LABEL_TOO_LARGE", "Label exceeds maximum size", details);
  }
}

export class IssuerAlreadySetError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(409, "ISSUER_ALREADY_SET", "Issuer already registered for document", details);
  }
}

// Value ledger

export class SlotMismatchError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(422, "SLOT_MISMATCH", "Tokens belong to different slots", details);
  }
}

export class InsufficientValueError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(422, "INSUFFICIENT_VALUE", "Insufficient token value", details);
  }
}

export class InsufficientAllowanceError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(403, "INSUFFICIENT_ALLOWANCE", "Insufficient value allowance", details);
  }
}

export class NotAuthorizedError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(403, "NOT_AUTHORIZED", "Caller is not authorized for this token", details);
  }
}

// Variants

export class TokenLockedError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(423, "TOKEN_LOCKED", "Token is permanently locked", details);
  }
}

export class AlreadyRevokedError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(409, "ALREADY_REVOKED", "Token already revoked", details);
  }
}

export class InvalidDelegationSignatureError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(401, "INVALID_DELEGATION_SIGNATURE", "Invalid delegation signature", details);
  }
}

export class UnsupportedOperationError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(405, "UNSUPPORTED_OPERATION", "Operation not supported by this resolver", details);
  }
}

// Administration and input

export class MissingRoleError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(403, "MISSING_ROLE", "Caller lacks the required role", details);
  }
}

export class ContractPausedError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(503, "CONTRACT_PAUSED", "Ledger is paused", details);
  }
}

export class ReentrantCallError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(409, "REENTRANT_CALL", "Operation already in progress", details);
  }
}

export class InvalidAddressError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(400, "INVALID_ADDRESS", "Invalid address", details);
  }
}

export class InvalidValueError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(400, "INVALID_VALUE", "Invalid value", details);
  }
}

export class InvalidBodyError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(400, "INVALID_BODY", "Invalid request body", details);
  }
}

export class ContentTooLargeError extends ProtocolError {
  constructor(details?: Record<string, unknown>) {
    super(413, "CONTENT_TOO_LARGE", "Content too large", details);
  }
}
