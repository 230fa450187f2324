export enum JewelryStatus {
  PENDING_APPRAISAL = 'pending_appraisal',
  APPRAISED = 'appraised',
  APPROVED = 'approved',
  IN_AUCTION = 'in_auction',
  SOLD = 'sold',
  UNSOLD = 'unsold',
  RETURNED = 'returned',
  WITHDRAWN = 'withdrawn',
}

export enum SellRequestStatus {
  SUBMITTED = 'submitted',
  PRELIM_APPRAISED = 'prelim_appraised',
  RECEIVED = 'received',
  FINAL_APPRAISED = 'final_appraised',
  MANAGER_APPROVED = 'manager_approved',
  SELLER_ACCEPTED = 'seller_accepted',
  ASSIGNED_TO_SESSION = 'assigned_to_session',
  REJECTED = 'rejected',
}
