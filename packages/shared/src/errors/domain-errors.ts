import { HttpException, HttpStatus } from '@nestjs/common';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base of every error the core raises. `code` is the stable reason code and
 * `details` the structured fields of the rejection, such as `minimum_bid`.
 * `getResponse()` is `{ reason_code, message, ...details }`; the HTTP
 * filter wraps code, message and details in its `{ success, error }` envelope.
 */
export abstract class DomainError extends HttpException {
  readonly code: string;
  readonly details: ErrorDetails;

  protected constructor(
    code: string,
    message: string,
    status: HttpStatus,
    details: ErrorDetails = {},
  ) {
    super({ reason_code: code, message, ...details }, status);
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, details?: ErrorDetails, code = 'VALIDATION_FAILED') {
    super(code, message, HttpStatus.BAD_REQUEST, details);
  }
}

export class AuthenticationError extends DomainError {
  constructor(code: string, message: string) {
    super(code, message, HttpStatus.UNAUTHORIZED);
  }
}

export class AuthorizationError extends DomainError {
  constructor(message: string, code = 'INSUFFICIENT_PERMISSIONS', details?: ErrorDetails) {
    super(code, message, HttpStatus.FORBIDDEN, details);
  }
}

export class NotFoundError extends DomainError {
  constructor(entity: string, id: string) {
    super('NOT_FOUND', `${entity} ${id} not found`, HttpStatus.NOT_FOUND, { entity, id });
  }
}

export class ConflictError extends DomainError {
  constructor(message: string, code = 'CONFLICT', details?: ErrorDetails) {
    super(code, message, HttpStatus.CONFLICT, details);
  }
}

/** Transient contention. The only kind a caller should retry. */
export class ConcurrencyError extends DomainError {
  constructor(message: string, details?: ErrorDetails) {
    super('CONCURRENT_MODIFICATION', message, HttpStatus.CONFLICT, details);
  }
}

export class ExternalServiceError extends DomainError {
  constructor(service: string, message: string, details?: ErrorDetails) {
    super('EXTERNAL_SERVICE_FAILURE', message, HttpStatus.BAD_GATEWAY, {
      service,
      ...details,
    });
  }
}

export class BusinessRuleViolationError extends DomainError {
  constructor(
    code: string,
    message: string,
    details?: ErrorDetails,
    status: HttpStatus = HttpStatus.BAD_REQUEST,
  ) {
    super(code, message, status, details);
  }
}

export class InvalidStateTransitionError extends BusinessRuleViolationError {
  readonly current: string;
  readonly expected: string[];

  constructor(entity: string, current: string, expected: string[], action: string) {
    super(
      'INVALID_STATE_TRANSITION',
      `Cannot ${action} ${entity} in status ${current}; expected ${expected.join(' or ')}`,
      { entity, current_status: current, expected_status: expected },
      HttpStatus.FORBIDDEN,
    );
    this.current = current;
    this.expected = expected;
  }
}

// ── Bidding ───────────────────────────────────────────────────

export class AuctionNotOpenError extends BusinessRuleViolationError {
  constructor(sessionStatus: string) {
    super('AUCTION_NOT_OPEN', `Auction session is not open (status: ${sessionStatus})`, {
      session_status: sessionStatus,
    });
  }
}

export class ItemNotAvailableError extends BusinessRuleViolationError {
  constructor(itemStatus: string) {
    super('ITEM_NOT_AVAILABLE', `Lot is not accepting bids (status: ${itemStatus})`, {
      item_status: itemStatus,
    });
  }
}

export class UserNotEnrolledError extends BusinessRuleViolationError {
  constructor() {
    super(
      'USER_NOT_ENROLLED',
      'An approved enrollment in this session is required to bid',
      undefined,
      HttpStatus.FORBIDDEN,
    );
  }
}

export class InsufficientBidError extends BusinessRuleViolationError {
  readonly minimumBid: string;

  constructor(minimumBid: string) {
    super('INSUFFICIENT_BID', `Minimum bid is ${minimumBid}`, {
      minimum_bid: minimumBid,
    });
    this.minimumBid = minimumBid;
  }
}
