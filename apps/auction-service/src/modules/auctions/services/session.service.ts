import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { Decimal } from 'decimal.js';
import {
  Actor,
  assertRole,
  BidIncrementPolicy,
  BidStatus,
  BusinessRuleViolationError,
  ConflictError,
  InvalidStateTransitionError,
  JewelryStatus,
  NotFoundError,
  SellRequestStatus,
  SessionItemStatus,
  SessionStatus,
  UserRole,
  ValidationError,
} from '@gemhouse/shared';
import { AUCTION_STORE, AuctionStore, StoreManager } from '../../../database/auction-store';
import { MetricsService } from '../../../metrics/metrics.service';
import { allocateCode, SESSION_CODE } from '../../../common/utils/codes';
import { MONEY_PATTERN, parseMoney, toMoney } from '../../../common/utils/money';
import { PageQuery, Paginated, pageWindow, toPage } from '../../../common/utils/pagination';
import { JewelryItem } from '../../consignment/entities/jewelry-item.entity';
import { SellRequest } from '../../consignment/entities/sell-request.entity';
import { AuctionSession, DEFAULT_SESSION_RULES, SessionRules } from '../entities/auction-session.entity';
import { SessionItem } from '../entities/session-item.entity';
import { Bid } from '../entities/bid.entity';
import { BidService, CloseItemResult } from './bid.service';

export const MAX_SESSION_DURATION_MS = 24 * 60 * 60 * 1000;
const MIN_STEP_PRICE = '1.00';
const MIN_RESERVE_PRICE = '1.00';

export interface CreateSessionInput {
  name: string;
  description?: string;
  code?: string;
  startAt: Date;
  endAt: Date;
  assignedStaffId?: string;
  rules?: Partial<SessionRules>;
}

export interface LotPricingInput {
  startPrice: string;
  stepPrice: string;
  reservePrice?: string;
}

export interface SessionFilters {
  status?: SessionStatus;
  search?: string;
}

export interface CloseSessionResult {
  session: AuctionSession;
  lots: CloseItemResult[];
}

interface SessionStep {
  action: string;
  from: SessionStatus[];
  to: SessionStatus;
  role: UserRole;
}

const SESSION_STEPS = {
  schedule: {
    action: 'schedule',
    from: [SessionStatus.DRAFT],
    to: SessionStatus.SCHEDULED,
    role: UserRole.MANAGER,
  },
  open: {
    action: 'open',
    from: [SessionStatus.SCHEDULED, SessionStatus.PAUSED],
    to: SessionStatus.OPEN,
    role: UserRole.STAFF,
  },
  pause: {
    action: 'pause',
    from: [SessionStatus.OPEN],
    to: SessionStatus.PAUSED,
    role: UserRole.STAFF,
  },
  close: {
    action: 'close',
    from: [SessionStatus.OPEN, SessionStatus.PAUSED],
    to: SessionStatus.CLOSED,
    role: UserRole.STAFF,
  },
  cancel: {
    action: 'cancel',
    from: [SessionStatus.DRAFT, SessionStatus.SCHEDULED, SessionStatus.OPEN, SessionStatus.PAUSED],
    to: SessionStatus.CANCELED,
    role: UserRole.MANAGER,
  },
} satisfies Record<string, SessionStep>;

const WITHDRAWABLE: SessionItemStatus[] = [SessionItemStatus.PENDING, SessionItemStatus.ACTIVE];

const MAX_ANTI_SNIPING_SECONDS = 3600;

function validateRules(input: Partial<SessionRules> = {}): SessionRules {
  const rules: SessionRules = { ...DEFAULT_SESSION_RULES };

  if (input.bidIncrementPolicy !== undefined) {
    if (!Object.values(BidIncrementPolicy).includes(input.bidIncrementPolicy)) {
      throw new ValidationError('rules.bidIncrementPolicy must be fixed or tiered', {
        field: 'rules.bidIncrementPolicy',
      });
    }
    rules.bidIncrementPolicy = input.bidIncrementPolicy;
  }
  if (input.requireRegistration !== undefined) {
    if (typeof input.requireRegistration !== 'boolean') {
      throw new ValidationError('rules.requireRegistration must be a boolean', {
        field: 'rules.requireRegistration',
      });
    }
    rules.requireRegistration = input.requireRegistration;
  }
  if (input.antiSnipingEnabled !== undefined) {
    if (typeof input.antiSnipingEnabled !== 'boolean') {
      throw new ValidationError('rules.antiSnipingEnabled must be a boolean', {
        field: 'rules.antiSnipingEnabled',
      });
    }
    rules.antiSnipingEnabled = input.antiSnipingEnabled;
  }
  for (const field of ['antiSnipingTriggerSeconds', 'antiSnipingExtensionSeconds'] as const) {
    const value = input[field];
    if (value === undefined) continue;
    if (!Number.isInteger(value) || value < 1 || value > MAX_ANTI_SNIPING_SECONDS) {
      throw new ValidationError(
        `rules.${field} must be a whole number of seconds between 1 and ${MAX_ANTI_SNIPING_SECONDS}`,
        { field: `rules.${field}` },
      );
    }
    rules[field] = value;
  }
  for (const field of ['buyerFeePercentage', 'sellerFeePercentage'] as const) {
    const value = input[field];
    if (value === undefined) continue;
    if (!MONEY_PATTERN.test(value) || new Decimal(value).greaterThan(100)) {
      throw new ValidationError(`rules.${field} must be a percentage between 0 and 100`, {
        field: `rules.${field}`,
      });
    }
    rules[field] = new Decimal(value).toFixed(2);
  }
  return rules;
}

function atLeastPrice(value: string, minimum: string, field: string): string {
  const price = parseMoney(value, field);
  if (price.lessThan(minimum)) {
    throw new ValidationError(`${field} must be at least ${minimum}`, { field });
  }
  return toMoney(price);
}

/**
 * Session lifecycle and lot assembly.
 *
 * DRAFT → SCHEDULED → OPEN ⇄ PAUSED → CLOSED, with CANCELED reachable from
 * every state before CLOSED. SETTLED is entered by SettlementService.
 */
@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);

  constructor(
    @Inject(AUCTION_STORE) private readonly store: AuctionStore,
    private readonly bids: BidService,
    @Optional() @Inject(MetricsService) private readonly metrics?: MetricsService,
  ) {}

  async createSession(actor: Actor, input: CreateSessionInput): Promise<AuctionSession> {
    assertRole(actor, UserRole.MANAGER, 'Creating a session');

    const name = input.name.trim();
    if (name.length === 0 || name.length > 200) {
      throw new ValidationError('name must be 1 to 200 characters', { field: 'name' });
    }
    if (Number.isNaN(input.startAt.getTime()) || Number.isNaN(input.endAt.getTime())) {
      throw new ValidationError('startAt and endAt must be valid dates', { field: 'startAt' });
    }
    if (input.startAt.getTime() >= input.endAt.getTime()) {
      throw new ValidationError('startAt must be before endAt', { field: 'endAt' });
    }
    if (input.endAt.getTime() - input.startAt.getTime() > MAX_SESSION_DURATION_MS) {
      throw new ValidationError('A session may last at most 24 hours', { field: 'endAt' });
    }
    const rules = validateRules(input.rules);

    const session = await this.store.transaction(async (m) => {
      let code: string;
      if (input.code) {
        code = input.code.trim().toUpperCase();
        if ((await m.count(AuctionSession, { code })) > 0) {
          throw new ConflictError(`Session code ${code} is already in use`, 'DUPLICATE_CODE', { code });
        }
      } else {
        code = await allocateCode(SESSION_CODE, async (c) => (await m.count(AuctionSession, { code: c })) > 0);
      }

      return m.insert(AuctionSession, {
        code,
        name,
        description: input.description?.trim() || null,
        startAt: input.startAt,
        endAt: input.endAt,
        status: SessionStatus.DRAFT,
        assignedStaffId: input.assignedStaffId ?? null,
        rules,
        createdBy: actor.userId,
      });
    });

    this.logger.log(
      JSON.stringify({ event: 'session_created', session_id: session.id, code: session.code, actor_id: actor.userId }),
    );
    return session;
  }

  /**
   * Assigns an approved item to the next lot number. The session row stays
   * locked from reading the current maximum until the new lot is written.
   */
  async addItemToSession(
    actor: Actor,
    sessionId: string,
    sellRequestId: string,
    pricing: LotPricingInput,
  ): Promise<SessionItem> {
    assertRole(actor, UserRole.STAFF, 'Adding a lot');

    const startPrice = parseMoney(pricing.startPrice, 'startPrice');
    if (startPrice.lessThanOrEqualTo(0)) {
      throw new ValidationError('startPrice must be greater than zero', { field: 'startPrice' });
    }
    const stepPrice = atLeastPrice(pricing.stepPrice, MIN_STEP_PRICE, 'stepPrice');
    const explicitReserve =
      pricing.reservePrice !== undefined
        ? atLeastPrice(pricing.reservePrice, MIN_RESERVE_PRICE, 'reservePrice')
        : undefined;

    const { lot, from } = await this.store.transaction(async (m) => {
      const session = await m.findOne(AuctionSession, { id: sessionId }, 'pessimistic_write');
      if (!session) {
        throw new NotFoundError('AuctionSession', sessionId);
      }
      const assembling = [SessionStatus.DRAFT, SessionStatus.SCHEDULED];
      if (!assembling.includes(session.status)) {
        throw new InvalidStateTransitionError('AuctionSession', session.status, assembling, 'add lots to');
      }

      const request = await m.findOne(SellRequest, { id: sellRequestId }, 'pessimistic_write');
      if (!request) {
        throw new NotFoundError('SellRequest', sellRequestId);
      }
      const assignable = [SellRequestStatus.MANAGER_APPROVED, SellRequestStatus.SELLER_ACCEPTED];
      if (!assignable.includes(request.status)) {
        throw new InvalidStateTransitionError('SellRequest', request.status, assignable, 'assign');
      }

      const item = await m.findOne(JewelryItem, { id: request.jewelryItemId }, 'pessimistic_write');
      if (!item) {
        throw new NotFoundError('JewelryItem', request.jewelryItemId);
      }

      const highest = await m.maximum(SessionItem, 'lotNumber', { sessionId });
      const lotNumber = (highest ?? 0) + 1;

      const lot = await m.insert(SessionItem, {
        sessionId,
        jewelryItemId: item.id,
        sellRequestId: request.id,
        lotNumber,
        reservePrice: explicitReserve ?? item.reservePrice,
        startPrice: toMoney(startPrice),
        stepPrice,
        currentHighestBid: null,
        currentWinnerId: null,
        bidCount: 0,
        status: SessionItemStatus.PENDING,
        closedAt: null,
      });

      const from = request.status;
      request.status = SellRequestStatus.ASSIGNED_TO_SESSION;
      request.assignedAt = new Date();
      await m.save(request);

      item.status = JewelryStatus.IN_AUCTION;
      await m.save(item);

      return { lot, from };
    });

    this.metrics?.sellRequestTransitionsTotal.inc({ from, to: SellRequestStatus.ASSIGNED_TO_SESSION });
    this.logger.log(
      JSON.stringify({
        event: 'lot_assigned',
        session_id: sessionId,
        session_item_id: lot.id,
        lot_number: lot.lotNumber,
        sell_request_id: sellRequestId,
      }),
    );
    return lot;
  }

  async scheduleSession(actor: Actor, sessionId: string): Promise<AuctionSession> {
    return this.transition(actor, sessionId, SESSION_STEPS.schedule, async (m, session) => {
      if ((await m.count(SessionItem, { sessionId })) === 0) {
        throw new BusinessRuleViolationError('SESSION_EMPTY', 'A session needs at least one lot to be scheduled');
      }
      if (session.startAt.getTime() <= Date.now()) {
        throw new BusinessRuleViolationError('START_IN_PAST', 'A session must start in the future');
      }
      if (session.endAt.getTime() <= session.startAt.getTime()) {
        throw new BusinessRuleViolationError('INVALID_WINDOW', 'endAt must be after startAt');
      }
    });
  }

  /** First opening activates every PENDING lot, lowest lot number first. */
  async openSession(actor: Actor, sessionId: string): Promise<AuctionSession> {
    return this.transition(actor, sessionId, SESSION_STEPS.open, async (m, session) => {
      if (session.openedAt !== null) return;
      session.openedAt = new Date();

      const pending = await m.find(SessionItem, {
        where: { sessionId, status: SessionItemStatus.PENDING },
        order: { lotNumber: 'ASC' },
      });
      for (const lot of pending) {
        lot.status = SessionItemStatus.ACTIVE;
        await m.save(lot);
      }
    });
  }

  async pauseSession(actor: Actor, sessionId: string): Promise<AuctionSession> {
    return this.transition(actor, sessionId, SESSION_STEPS.pause);
  }

  /**
   * Closes the session, then every lot still ACTIVE, one transaction per
   * lot. Bids already holding a lot lock finish first; later ones see the
   * CLOSED session and are rejected.
   */
  async closeSession(actor: Actor, sessionId: string): Promise<CloseSessionResult> {
    const session = await this.transition(actor, sessionId, SESSION_STEPS.close, async (_m, s) => {
      s.closedAt = new Date();
    });

    const active = await this.store.manager.find(SessionItem, {
      where: { sessionId, status: SessionItemStatus.ACTIVE },
      order: { lotNumber: 'ASC' },
    });
    const lots: CloseItemResult[] = [];
    for (const lot of active) {
      lots.push(await this.bids.closeItem(actor, lot.id));
    }
    return { session, lots };
  }

  async cancelSession(actor: Actor, sessionId: string): Promise<AuctionSession> {
    return this.transition(actor, sessionId, SESSION_STEPS.cancel, async (m, session) => {
      session.canceledAt = new Date();
      const lots = await m.find(SessionItem, { where: { sessionId }, order: { lotNumber: 'ASC' } });
      for (const lot of lots) {
        if (WITHDRAWABLE.includes(lot.status)) {
          await this.withdrawLot(m, lot, JewelryStatus.RETURNED);
        }
      }
    });
  }

  async withdrawItem(actor: Actor, sessionItemId: string): Promise<SessionItem> {
    assertRole(actor, UserRole.STAFF, 'Withdrawing a lot');

    const lot = await this.store.transaction(async (m) => {
      const lot = await m.findOne(SessionItem, { id: sessionItemId }, 'pessimistic_write');
      if (!lot) {
        throw new NotFoundError('SessionItem', sessionItemId);
      }
      if (!WITHDRAWABLE.includes(lot.status)) {
        throw new InvalidStateTransitionError('SessionItem', lot.status, WITHDRAWABLE, 'withdraw');
      }
      return this.withdrawLot(m, lot, JewelryStatus.WITHDRAWN);
    });

    this.logger.log(
      JSON.stringify({ event: 'lot_withdrawn', session_item_id: sessionItemId, actor_id: actor.userId }),
    );
    return lot;
  }

  async findById(sessionId: string): Promise<AuctionSession> {
    const session = await this.store.manager.findOne(AuctionSession, { id: sessionId });
    if (!session) {
      throw new NotFoundError('AuctionSession', sessionId);
    }
    return session;
  }

  async list(filters: SessionFilters, query: PageQuery): Promise<Paginated<AuctionSession>> {
    const window = pageWindow(query);
    const [data, total] = await this.store.manager.findAndCount(AuctionSession, {
      where: { status: filters.status },
      search: filters.search ? { columns: ['name', 'code'], term: filters.search } : undefined,
      skip: window.skip,
      take: window.limit,
    });
    return toPage(data, total, window);
  }

  async listItems(sessionId: string): Promise<SessionItem[]> {
    await this.findById(sessionId);
    return this.store.manager.find(SessionItem, { where: { sessionId }, order: { lotNumber: 'ASC' } });
  }

  // ── Private helpers ────────────────────────────────────────────

  private async withdrawLot(m: StoreManager, lot: SessionItem, jewelryStatus: JewelryStatus): Promise<SessionItem> {
    const bids = await m.find(Bid, { where: { sessionItemId: lot.id } });
    for (const bid of bids) {
      if (bid.status === BidStatus.INVALID) continue;
      bid.status = BidStatus.INVALID;
      await m.save(bid);
    }

    const item = await m.findOne(JewelryItem, { id: lot.jewelryItemId }, 'pessimistic_write');
    if (item) {
      item.status = jewelryStatus;
      await m.save(item);
    }

    lot.status = SessionItemStatus.WITHDRAWN;
    lot.currentWinnerId = null;
    lot.closedAt = new Date();
    return m.save(lot);
  }

  private async transition(
    actor: Actor,
    sessionId: string,
    step: SessionStep,
    effect?: (m: StoreManager, session: AuctionSession) => Promise<void>,
  ): Promise<AuctionSession> {
    assertRole(actor, step.role, `Attempting to ${step.action} a session`);

    const { session, from } = await this.store.transaction(async (m) => {
      const session = await m.findOne(AuctionSession, { id: sessionId }, 'pessimistic_write');
      if (!session) {
        throw new NotFoundError('AuctionSession', sessionId);
      }
      if (!step.from.includes(session.status)) {
        throw new InvalidStateTransitionError('AuctionSession', session.status, step.from, step.action);
      }

      const from = session.status;
      if (effect) {
        await effect(m, session);
      }
      session.status = step.to;
      return { session: await m.save(session), from };
    });

    this.metrics?.sessionTransitionsTotal.inc({ from, to: step.to });
    this.logger.log(
      JSON.stringify({
        event: 'session_transition',
        session_id: sessionId,
        from,
        to: step.to,
        actor_id: actor.userId,
      }),
    );
    return session;
  }
}
