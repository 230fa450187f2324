export enum NotificationType {
  ITEM_SUBMITTED = 'item_submitted',
  PRELIMINARY_VALUATION = 'preliminary_valuation',
  MANAGER_APPROVAL_NEEDED = 'manager_approval_needed',
  ITEM_APPROVED = 'item_approved',
  ITEM_REJECTED = 'item_rejected',
  AUCTION_WON = 'auction_won',
}
