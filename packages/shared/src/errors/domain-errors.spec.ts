import {
  AuctionNotOpenError,
  BusinessRuleViolationError,
  ConcurrencyError,
  ExternalServiceError,
  InsufficientBidError,
  InvalidStateTransitionError,
  NotFoundError,
  UserNotEnrolledError,
  ValidationError,
} from './domain-errors';

describe('domain errors', () => {
  it('renders reason_code and message in the HTTP body', () => {
    const err = new ValidationError('title is required', { field: 'title' });
    expect(err.getStatus()).toBe(400);
    expect(err.getResponse()).toEqual({
      reason_code: 'VALIDATION_FAILED',
      message: 'title is required',
      field: 'title',
    });
    expect(err.message).toBe('title is required');
  });

  it('names current and expected status on invalid transitions', () => {
    const err = new InvalidStateTransitionError(
      'SellRequest',
      'submitted',
      ['final_appraised'],
      'managerApprove',
    );
    expect(err).toBeInstanceOf(BusinessRuleViolationError);
    expect(err.getStatus()).toBe(403);
    expect(err.code).toBe('INVALID_STATE_TRANSITION');
    expect(err.current).toBe('submitted');
    expect(err.expected).toEqual(['final_appraised']);
    expect(err.message).toBe(
      'Cannot managerApprove SellRequest in status submitted; expected final_appraised',
    );
  });

  it('carries the minimum on insufficient bids', () => {
    const err = new InsufficientBidError('1100.00');
    expect(err.minimumBid).toBe('1100.00');
    expect(err.getResponse()).toEqual({
      reason_code: 'INSUFFICIENT_BID',
      message: 'Minimum bid is 1100.00',
      minimum_bid: '1100.00',
    });
  });

  it('maps each kind to its HTTP status', () => {
    expect(new AuctionNotOpenError('closed').getStatus()).toBe(400);
    expect(new UserNotEnrolledError().getStatus()).toBe(403);
    expect(new NotFoundError('Bid', 'b-1').getStatus()).toBe(404);
    expect(new ConcurrencyError('busy').getStatus()).toBe(409);
    expect(new ExternalServiceError('payment-gateway', 'timed out').getStatus()).toBe(502);
  });

  it('keeps the subclass name', () => {
    expect(new NotFoundError('Bid', 'b-1').name).toBe('NotFoundError');
  });
});
