export enum SessionStatus {
  DRAFT = 'draft',
  SCHEDULED = 'scheduled',
  OPEN = 'open',
  PAUSED = 'paused',
  CLOSED = 'closed',
  SETTLED = 'settled',
  CANCELED = 'canceled',
}

export enum SessionItemStatus {
  PENDING = 'pending',
  ACTIVE = 'active',
  SOLD = 'sold',
  UNSOLD = 'unsold',
  WITHDRAWN = 'withdrawn',
}

export enum EnrollmentStatus {
  PENDING = 'pending',
  APPROVED = 'approved',
  REJECTED = 'rejected',
  CANCELED = 'canceled',
}

export enum BidStatus {
  VALID = 'valid',
  INVALID = 'invalid',
  OUTBID = 'outbid',
  WINNING = 'winning',
}

export enum BidIncrementPolicy {
  FIXED = 'fixed',
  TIERED = 'tiered',
}

export enum BidRejectionReason {
  AUCTION_NOT_OPEN = 'AUCTION_NOT_OPEN',
  ITEM_NOT_AVAILABLE = 'ITEM_NOT_AVAILABLE',
  USER_NOT_ENROLLED = 'USER_NOT_ENROLLED',
  INSUFFICIENT_BID = 'INSUFFICIENT_BID',
}
