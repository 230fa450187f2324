import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { Decimal } from 'decimal.js';
import {
  Actor,
  assertOwner,
  assertRole,
  atLeast,
  BusinessRuleViolationError,
  ConflictError,
  InvalidStateTransitionError,
  JewelryStatus,
  NotFoundError,
  NotificationType,
  SellRequestStatus,
  UserRole,
  ValidationError,
} from '@gemhouse/shared';
import { AUCTION_STORE, AuctionStore, StoreManager } from '../../../database/auction-store';
import { MetricsService } from '../../../metrics/metrics.service';
import { allocateCode, JEWELRY_CODE } from '../../../common/utils/codes';
import { parseMoney, toMoney } from '../../../common/utils/money';
import { PageQuery, Paginated, pageWindow, toPage } from '../../../common/utils/pagination';
import { NotificationService } from '../../notifications/services/notification.service';
import { JewelryItem } from '../entities/jewelry-item.entity';
import { SellRequest } from '../entities/sell-request.entity';

export const MAX_TITLE_LENGTH = 200;
export const MAX_DESCRIPTION_LENGTH = 2000;
export const MAX_PHOTOS = 10;

const WEIGHT_PATTERN = /^\d{1,7}(\.\d{1,3})?$/;

export interface SubmitSellRequestInput {
  title: string;
  description: string;
  photos: string[];
  attributes?: Record<string, string>;
  /** grams */
  weight?: string;
  code?: string;
  sellerNotes?: string;
}

export interface SellRequestWithItem {
  sellRequest: SellRequest;
  jewelryItem: JewelryItem;
}

export interface SellRequestFilters {
  status?: SellRequestStatus;
  sellerId?: string;
}

type StampColumn =
  | 'submittedAt'
  | 'appraisedAt'
  | 'receivedAt'
  | 'finalAppraisedAt'
  | 'approvedAt'
  | 'acceptedAt'
  | 'rejectedAt';

interface WorkflowStep {
  action: string;
  from: SellRequestStatus[];
  to: SellRequestStatus;
  /** `seller` means the request's own seller, regardless of role. */
  caller: UserRole | 'seller' | 'staff-or-seller';
  requires?: StampColumn;
  stamp: StampColumn;
}

const OPEN_STATUSES: SellRequestStatus[] = [
  SellRequestStatus.SUBMITTED,
  SellRequestStatus.PRELIM_APPRAISED,
  SellRequestStatus.RECEIVED,
  SellRequestStatus.FINAL_APPRAISED,
  SellRequestStatus.MANAGER_APPROVED,
  SellRequestStatus.SELLER_ACCEPTED,
];

const STEPS = {
  preliminaryAppraise: {
    action: 'preliminarily appraise',
    from: [SellRequestStatus.SUBMITTED],
    to: SellRequestStatus.PRELIM_APPRAISED,
    caller: UserRole.STAFF,
    requires: 'submittedAt',
    stamp: 'appraisedAt',
  },
  markReceived: {
    action: 'mark received',
    from: [SellRequestStatus.PRELIM_APPRAISED],
    to: SellRequestStatus.RECEIVED,
    caller: UserRole.STAFF,
    requires: 'appraisedAt',
    stamp: 'receivedAt',
  },
  finalAppraise: {
    action: 'finally appraise',
    from: [SellRequestStatus.RECEIVED],
    to: SellRequestStatus.FINAL_APPRAISED,
    caller: UserRole.STAFF,
    requires: 'receivedAt',
    stamp: 'finalAppraisedAt',
  },
  managerApprove: {
    action: 'approve',
    from: [SellRequestStatus.FINAL_APPRAISED],
    to: SellRequestStatus.MANAGER_APPROVED,
    caller: UserRole.MANAGER,
    requires: 'finalAppraisedAt',
    stamp: 'approvedAt',
  },
  sellerAccept: {
    action: 'accept',
    from: [SellRequestStatus.MANAGER_APPROVED],
    to: SellRequestStatus.SELLER_ACCEPTED,
    caller: 'seller',
    requires: 'approvedAt',
    stamp: 'acceptedAt',
  },
  reject: {
    action: 'reject',
    from: OPEN_STATUSES,
    to: SellRequestStatus.REJECTED,
    caller: 'staff-or-seller',
    stamp: 'rejectedAt',
  },
} satisfies Record<string, WorkflowStep>;

function positivePrice(value: string, field: string): string {
  const price = parseMoney(value, field);
  if (price.lessThanOrEqualTo(0)) {
    throw new ValidationError(`${field} must be greater than zero`, { field });
  }
  return toMoney(price);
}

/**
 * Drives a consigned item from submission to session assignment.
 *
 * Every transition runs in its own transaction with the sell request row
 * locked, checks the caller, the current status and the predecessor stage's
 * timestamp, and only then writes. A rejected check leaves both records as
 * they were.
 */
@Injectable()
export class SellRequestService {
  private readonly logger = new Logger(SellRequestService.name);

  constructor(
    @Inject(AUCTION_STORE) private readonly store: AuctionStore,
    private readonly notifications: NotificationService,
    @Optional() @Inject(MetricsService) private readonly metrics?: MetricsService,
  ) {}

  async submit(actor: Actor, input: SubmitSellRequestInput): Promise<SellRequestWithItem> {
    assertRole(actor, UserRole.MEMBER, 'Submitting a sell request');

    const title = input.title.trim();
    const description = input.description.trim();
    if (title.length === 0) {
      throw new ValidationError('title must not be empty', { field: 'title' });
    }
    if (title.length > MAX_TITLE_LENGTH) {
      throw new ValidationError(`title must be at most ${MAX_TITLE_LENGTH} characters`, { field: 'title' });
    }
    if (description.length === 0) {
      throw new ValidationError('description must not be empty', { field: 'description' });
    }
    if (description.length > MAX_DESCRIPTION_LENGTH) {
      throw new ValidationError(`description must be at most ${MAX_DESCRIPTION_LENGTH} characters`, {
        field: 'description',
      });
    }
    if (input.photos.length === 0) {
      throw new ValidationError('at least one photo is required', { field: 'photos' });
    }
    if (input.photos.length > MAX_PHOTOS) {
      throw new ValidationError(`at most ${MAX_PHOTOS} photos are allowed`, { field: 'photos' });
    }
    let weight: string | null = null;
    if (input.weight !== undefined) {
      if (!WEIGHT_PATTERN.test(input.weight) || new Decimal(input.weight).lessThanOrEqualTo(0)) {
        throw new ValidationError('weight must be a positive number of grams', { field: 'weight' });
      }
      weight = new Decimal(input.weight).toFixed(3);
    }

    const result = await this.store.transaction(async (m) => {
      const code = input.code
        ? await this.checkCodeFree(m, actor, input.code.trim().toUpperCase())
        : await allocateCode(JEWELRY_CODE, async (c) => (await m.count(JewelryItem, { code: c })) > 0);

      const jewelryItem = await m.insert(JewelryItem, {
        code,
        title,
        description,
        attributes: input.attributes ?? {},
        weight,
        photos: [...input.photos],
        ownerId: actor.userId,
        status: JewelryStatus.PENDING_APPRAISAL,
        estimatedPrice: null,
        reservePrice: null,
      });

      const sellRequest = await m.insert(SellRequest, {
        sellerId: actor.userId,
        jewelryItemId: jewelryItem.id,
        status: SellRequestStatus.SUBMITTED,
        sellerNotes: input.sellerNotes?.trim() || null,
        submittedAt: new Date(),
      });

      return { sellRequest, jewelryItem };
    });

    this.logger.log(
      JSON.stringify({
        event: 'sell_request_submitted',
        sell_request_id: result.sellRequest.id,
        jewelry_item_id: result.jewelryItem.id,
        code: result.jewelryItem.code,
        seller_id: actor.userId,
      }),
    );
    await this.notifications.notify([actor.userId], {
      type: NotificationType.ITEM_SUBMITTED,
      sellRequestId: result.sellRequest.id,
      itemTitle: result.jewelryItem.title,
    });
    return result;
  }

  async preliminaryAppraise(
    actor: Actor,
    id: string,
    input: { estimatedPrice: string; notes?: string },
  ): Promise<SellRequest> {
    const estimatedPrice = positivePrice(input.estimatedPrice, 'estimatedPrice');
    const { sellRequest, jewelryItem } = await this.transition(
      actor,
      id,
      STEPS.preliminaryAppraise,
      (request, item) => {
        item.estimatedPrice = estimatedPrice;
        if (input.notes) request.staffNotes = input.notes;
      },
    );
    await this.notifications.notify([sellRequest.sellerId], {
      type: NotificationType.PRELIMINARY_VALUATION,
      sellRequestId: sellRequest.id,
      itemTitle: jewelryItem.title,
      price: estimatedPrice,
    });
    return sellRequest;
  }

  async markReceived(actor: Actor, id: string, input: { notes?: string } = {}): Promise<SellRequest> {
    const { sellRequest } = await this.transition(actor, id, STEPS.markReceived, (request) => {
      if (input.notes) request.staffNotes = input.notes;
    });
    return sellRequest;
  }

  async finalAppraise(
    actor: Actor,
    id: string,
    input: { estimatedPrice: string; reservePrice?: string; notes?: string },
  ): Promise<SellRequest> {
    const estimatedPrice = positivePrice(input.estimatedPrice, 'estimatedPrice');
    const reservePrice =
      input.reservePrice !== undefined ? positivePrice(input.reservePrice, 'reservePrice') : null;
    const { sellRequest, jewelryItem } = await this.transition(actor, id, STEPS.finalAppraise, (request, item) => {
      item.estimatedPrice = estimatedPrice;
      item.reservePrice = reservePrice;
      item.status = JewelryStatus.APPRAISED;
      if (input.notes) request.staffNotes = input.notes;
    });
    await this.notifications.notifyRole(UserRole.MANAGER, {
      type: NotificationType.MANAGER_APPROVAL_NEEDED,
      sellRequestId: sellRequest.id,
      itemTitle: jewelryItem.title,
      price: estimatedPrice,
    });
    return sellRequest;
  }

  async managerApprove(actor: Actor, id: string, input: { notes?: string } = {}): Promise<SellRequest> {
    let approvedPrice = '';
    const { sellRequest, jewelryItem } = await this.transition(actor, id, STEPS.managerApprove, (request, item) => {
      if (item.estimatedPrice === null || new Decimal(item.estimatedPrice).lessThanOrEqualTo(0)) {
        throw new BusinessRuleViolationError(
          'MISSING_APPRAISAL',
          'An item needs a positive estimated price before approval',
          { jewelry_item_id: item.id },
        );
      }
      approvedPrice = item.estimatedPrice;
      item.status = JewelryStatus.APPROVED;
      if (input.notes) request.managerNotes = input.notes;
    });
    await this.notifications.notify([sellRequest.sellerId], {
      type: NotificationType.ITEM_APPROVED,
      sellRequestId: sellRequest.id,
      itemTitle: jewelryItem.title,
      price: approvedPrice,
    });
    return sellRequest;
  }

  async sellerAccept(actor: Actor, id: string, input: { notes?: string } = {}): Promise<SellRequest> {
    const { sellRequest } = await this.transition(actor, id, STEPS.sellerAccept, (request) => {
      if (input.notes) request.sellerNotes = input.notes;
    });
    return sellRequest;
  }

  async reject(actor: Actor, id: string, input: { reason: string }): Promise<SellRequest> {
    const reason = input.reason.trim();
    if (reason.length === 0) {
      throw new ValidationError('reason must not be empty', { field: 'reason' });
    }
    const { sellRequest, jewelryItem } = await this.transition(actor, id, STEPS.reject, (request, item) => {
      request.rejectionReason = reason;
      item.status = JewelryStatus.RETURNED;
    });
    await this.notifications.notify([sellRequest.sellerId], {
      type: NotificationType.ITEM_REJECTED,
      sellRequestId: sellRequest.id,
      itemTitle: jewelryItem.title,
      reason,
    });
    return sellRequest;
  }

  async findById(actor: Actor, id: string): Promise<SellRequestWithItem> {
    const sellRequest = await this.store.manager.findOne(SellRequest, { id });
    if (!sellRequest) {
      throw new NotFoundError('SellRequest', id);
    }
    if (!atLeast(actor.role, UserRole.STAFF)) {
      assertOwner(actor, sellRequest.sellerId, 'view this sell request');
    }
    const jewelryItem = await this.store.manager.findOne(JewelryItem, { id: sellRequest.jewelryItemId });
    if (!jewelryItem) {
      throw new NotFoundError('JewelryItem', sellRequest.jewelryItemId);
    }
    return { sellRequest, jewelryItem };
  }

  /** Members only ever see their own requests. */
  async list(actor: Actor, filters: SellRequestFilters, query: PageQuery): Promise<Paginated<SellRequest>> {
    assertRole(actor, UserRole.MEMBER, 'Listing sell requests');
    const window = pageWindow(query);
    const sellerId = atLeast(actor.role, UserRole.STAFF) ? filters.sellerId : actor.userId;

    const [data, total] = await this.store.manager.findAndCount(SellRequest, {
      where: { status: filters.status, sellerId },
      skip: window.skip,
      take: window.limit,
    });
    return toPage(data, total, window);
  }

  // ── Private helpers ────────────────────────────────────────────

  private async checkCodeFree(m: StoreManager, actor: Actor, code: string): Promise<string> {
    const existing = await m.findOne(JewelryItem, { code });
    if (!existing) {
      return code;
    }
    if (existing.ownerId === actor.userId) {
      const request = await m.findOne(SellRequest, { jewelryItemId: existing.id });
      if (request && OPEN_STATUSES.includes(request.status)) {
        throw new BusinessRuleViolationError(
          'DUPLICATE_OPEN_REQUEST',
          `Item ${code} already has an open sell request`,
          { sell_request_id: request.id },
        );
      }
    }
    throw new ConflictError(`Jewelry code ${code} is already in use`, 'DUPLICATE_CODE', { code });
  }

  private authorize(actor: Actor, step: WorkflowStep, request: SellRequest): void {
    if (step.caller === 'seller') {
      assertOwner(actor, request.sellerId, step.action);
    } else if (step.caller === 'staff-or-seller') {
      if (actor.userId !== request.sellerId) {
        assertRole(actor, UserRole.STAFF, `Attempting to ${step.action}`);
      }
    } else {
      assertRole(actor, step.caller, `Attempting to ${step.action}`);
    }
  }

  private async transition(
    actor: Actor,
    id: string,
    step: WorkflowStep,
    apply: (request: SellRequest, item: JewelryItem) => void,
  ): Promise<SellRequestWithItem> {
    const { request, item, from } = await this.store.transaction(async (m) => {
      const request = await m.findOne(SellRequest, { id }, 'pessimistic_write');
      if (!request) {
        throw new NotFoundError('SellRequest', id);
      }

      this.authorize(actor, step, request);

      if (!step.from.includes(request.status)) {
        throw new InvalidStateTransitionError('SellRequest', request.status, step.from, step.action);
      }
      if (step.requires && request[step.requires] === null) {
        throw new InvalidStateTransitionError(
          'SellRequest',
          `${request.status} (missing ${step.requires})`,
          step.from,
          step.action,
        );
      }

      const item = await m.findOne(JewelryItem, { id: request.jewelryItemId }, 'pessimistic_write');
      if (!item) {
        throw new NotFoundError('JewelryItem', request.jewelryItemId);
      }

      apply(request, item);

      const from = request.status;
      request.status = step.to;
      request[step.stamp] = new Date();

      return { item: await m.save(item), request: await m.save(request), from };
    });

    this.metrics?.sellRequestTransitionsTotal.inc({ from, to: step.to });
    this.logger.log(
      JSON.stringify({
        event: 'sell_request_transition',
        sell_request_id: id,
        from,
        to: step.to,
        actor_id: actor.userId,
      }),
    );
    return { sellRequest: request, jewelryItem: item };
  }
}
