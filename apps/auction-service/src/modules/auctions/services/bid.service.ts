import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Decimal } from 'decimal.js';
import {
  Actor,
  assertRole,
  AuctionNotOpenError,
  BidStatus,
  ConflictError,
  DomainError,
  EnrollmentStatus,
  InsufficientBidError,
  InvalidStateTransitionError,
  ItemNotAvailableError,
  JewelryStatus,
  NotFoundError,
  NotificationType,
  SessionItemStatus,
  SessionStatus,
  UserNotEnrolledError,
  UserRole,
  ValidationError,
} from '@gemhouse/shared';
import { AUCTION_STORE, AuctionStore } from '../../../database/auction-store';
import { executeWithRetry } from '../../../database/db-retry.util';
import { MetricsService } from '../../../metrics/metrics.service';
import { parseMoney, toMoney } from '../../../common/utils/money';
import { PageQuery, Paginated, pageWindow, toPage } from '../../../common/utils/pagination';
import { JewelryItem } from '../../consignment/entities/jewelry-item.entity';
import { SettlementResult, SettlementService } from '../../payments/services/settlement.service';
import { NotificationService } from '../../notifications/services/notification.service';
import { AuctionSession, DEFAULT_SESSION_RULES } from '../entities/auction-session.entity';
import { SessionItem } from '../entities/session-item.entity';
import { Enrollment } from '../entities/enrollment.entity';
import { Bid } from '../entities/bid.entity';
import { minimumNextBid } from '../utils/bid-increment';

interface Admission {
  bid: Bid;
  /** New session end when the bid landed inside the anti-sniping window. */
  extendedUntil: Date | null;
}

export interface CloseItemResult {
  sessionItem: SessionItem;
  winningBid: Bid | null;
  settlement: SettlementResult | null;
}

@Injectable()
export class BidService {
  private readonly logger = new Logger(BidService.name);
  private readonly retryAttempts: number;

  constructor(
    @Inject(AUCTION_STORE) private readonly store: AuctionStore,
    private readonly settlement: SettlementService,
    private readonly notifications: NotificationService,
    private readonly config: ConfigService,
    @Optional() @Inject(MetricsService) private readonly metrics?: MetricsService,
  ) {
    this.retryAttempts = this.config.get<number>('BID_RETRY_ATTEMPTS') ?? 3;
  }

  async placeBid(
    actor: Actor,
    sessionItemId: string,
    amount: string,
    idempotencyKey?: string,
  ): Promise<Bid> {
    assertRole(actor, UserRole.MEMBER, 'Bidding');

    const bidAmount = parseMoney(amount, 'amount');
    if (bidAmount.lessThanOrEqualTo(0)) {
      throw new ValidationError('amount must be greater than zero', { field: 'amount' });
    }
    const key = idempotencyKey?.trim() || null;

    // ── PHASE 0: Idempotency fast-path (before locking) ────────
    const replay = await this.findReplay(actor, sessionItemId, key);
    if (replay) {
      this.logger.debug(`Idempotent hit: ${key}`);
      return replay;
    }

    try {
      const { bid, extendedUntil } = await executeWithRetry(
        () => this.admit(actor, sessionItemId, bidAmount, key),
        { maxRetries: this.retryAttempts, context: 'place_bid' },
      );

      this.metrics?.bidsAcceptedTotal.inc();
      this.logger.log(
        JSON.stringify({
          event: 'bid_accepted',
          bid_id: bid.id,
          session_item_id: sessionItemId,
          bidder_id: actor.userId,
          amount: bid.amount,
        }),
      );
      if (extendedUntil) {
        this.metrics?.sessionExtensionsTotal.inc();
        this.logger.log(
          JSON.stringify({
            event: 'session_extended',
            session_id: bid.sessionId,
            bid_id: bid.id,
            ends_at: extendedUntil.toISOString(),
          }),
        );
      }
      return bid;
    } catch (err) {
      // Same key raced in on another connection; that insert won.
      if (key && err instanceof ConflictError) {
        const winner = await this.findReplay(actor, sessionItemId, key);
        if (winner) return winner;
      }
      if (err instanceof DomainError) {
        this.metrics?.bidRejectionsTotal.inc({ reason_code: err.code });
        this.logger.warn(
          JSON.stringify({
            event: 'bid_rejected',
            session_item_id: sessionItemId,
            bidder_id: actor.userId,
            amount: toMoney(bidAmount),
            reason_code: err.code,
          }),
        );
      }
      throw err;
    }
  }

  async getCurrentWinner(sessionItemId: string): Promise<Bid | null> {
    await this.requireLot(sessionItemId);
    return this.store.manager.findOne(Bid, { sessionItemId, status: BidStatus.WINNING });
  }

  /** Committed state only; never the value of an in-flight bid. */
  async getHighestAmount(sessionItemId: string): Promise<string | null> {
    const lot = await this.requireLot(sessionItemId);
    return lot.currentHighestBid;
  }

  async listBids(sessionItemId: string, query: PageQuery): Promise<Paginated<Bid>> {
    await this.requireLot(sessionItemId);
    const window = pageWindow(query);
    const [data, total] = await this.store.manager.findAndCount(Bid, {
      where: { sessionItemId },
      order: { placedAt: 'DESC' },
      skip: window.skip,
      take: window.limit,
    });
    return toPage(data, total, window);
  }

  async listUserBids(actor: Actor, query: PageQuery): Promise<Paginated<Bid>> {
    const window = pageWindow(query);
    const [data, total] = await this.store.manager.findAndCount(Bid, {
      where: { bidderId: actor.userId },
      order: { placedAt: 'DESC' },
      skip: window.skip,
      take: window.limit,
    });
    return toPage(data, total, window);
  }

  /**
   * Ends bidding on one ACTIVE lot. The lot sells when it has a WINNING bid
   * that meets the reserve; settlement runs after the closing transaction
   * has committed.
   */
  async closeItem(actor: Actor, sessionItemId: string): Promise<CloseItemResult> {
    assertRole(actor, UserRole.STAFF, 'Closing a lot');

    const { sessionItem, winningBid, itemTitle } = await this.store.transaction(async (m) => {
      const lot = await m.findOne(SessionItem, { id: sessionItemId }, 'pessimistic_write');
      if (!lot) {
        throw new NotFoundError('SessionItem', sessionItemId);
      }
      if (lot.status !== SessionItemStatus.ACTIVE) {
        throw new InvalidStateTransitionError('SessionItem', lot.status, [SessionItemStatus.ACTIVE], 'close');
      }

      const winner = await m.findOne(Bid, { sessionItemId, status: BidStatus.WINNING });
      const sold =
        winner !== null &&
        (lot.reservePrice === null || new Decimal(winner.amount).greaterThanOrEqualTo(lot.reservePrice));

      const jewelry = await m.findOne(JewelryItem, { id: lot.jewelryItemId }, 'pessimistic_write');
      if (!jewelry) {
        throw new NotFoundError('JewelryItem', lot.jewelryItemId);
      }

      lot.status = sold ? SessionItemStatus.SOLD : SessionItemStatus.UNSOLD;
      lot.closedAt = new Date();
      jewelry.status = sold ? JewelryStatus.SOLD : JewelryStatus.UNSOLD;

      await m.save(jewelry);
      return { sessionItem: await m.save(lot), winningBid: winner, itemTitle: jewelry.title };
    });

    const outcome = sessionItem.status === SessionItemStatus.SOLD ? 'sold' : 'unsold';
    this.metrics?.lotsClosedTotal.inc({ outcome });
    this.logger.log(
      JSON.stringify({
        event: 'lot_closed',
        session_item_id: sessionItemId,
        lot_number: sessionItem.lotNumber,
        outcome,
        hammer_price: outcome === 'sold' ? sessionItem.currentHighestBid : null,
        reserve_price: sessionItem.reservePrice,
      }),
    );

    const settlement =
      sessionItem.status === SessionItemStatus.SOLD
        ? await this.settlement.settle(actor, sessionItemId)
        : null;

    if (settlement && winningBid) {
      await this.notifications.notify([winningBid.bidderId], {
        type: NotificationType.AUCTION_WON,
        sessionId: sessionItem.sessionId,
        sessionItemId,
        itemTitle,
        amount: winningBid.amount,
        paymentId: settlement.payment.id,
      });
    }

    return { sessionItem, winningBid, settlement };
  }

  // ── Private helpers ────────────────────────────────────────────

  private async findReplay(actor: Actor, sessionItemId: string, key: string | null): Promise<Bid | null> {
    if (!key) return null;
    return this.store.manager.findOne(Bid, {
      sessionItemId,
      bidderId: actor.userId,
      idempotencyKey: key,
    });
  }

  private async requireLot(sessionItemId: string): Promise<SessionItem> {
    const lot = await this.store.manager.findOne(SessionItem, { id: sessionItemId });
    if (!lot) {
      throw new NotFoundError('SessionItem', sessionItemId);
    }
    return lot;
  }

  /**
   * One attempt: a single transaction holding the lot and its session row
   * for its duration, so a close or an end-time extension cannot interleave.
   */
  private async admit(
    actor: Actor,
    sessionItemId: string,
    amount: Decimal,
    key: string | null,
  ): Promise<Admission> {
    return this.store.transaction(async (m) => {
      // ── PHASE 1: Idempotency re-check inside transaction ────
      if (key) {
        const existing = await m.findOne(Bid, { sessionItemId, bidderId: actor.userId, idempotencyKey: key });
        if (existing) return { bid: existing, extendedUntil: null };
      }

      // ── PHASE 2: Lock the lot, then its session ──────────────
      const lot = await m.findOne(SessionItem, { id: sessionItemId }, 'pessimistic_write');
      if (!lot) {
        throw new NotFoundError('SessionItem', sessionItemId);
      }
      const session = await m.findOne(AuctionSession, { id: lot.sessionId }, 'pessimistic_write');
      if (!session) {
        throw new NotFoundError('AuctionSession', lot.sessionId);
      }

      // ── PHASE 3: Session open ───────────────────────────────
      const now = new Date();
      if (session.status !== SessionStatus.OPEN) {
        throw new AuctionNotOpenError(session.status);
      }
      if (now.getTime() > session.endAt.getTime()) {
        throw new AuctionNotOpenError('ended');
      }

      // ── PHASE 4: Lot accepting bids ─────────────────────────
      if (lot.status !== SessionItemStatus.ACTIVE) {
        throw new ItemNotAvailableError(lot.status);
      }

      // ── PHASE 5: Enrollment ─────────────────────────────────
      const enrollment = await m.findOne(Enrollment, { sessionId: session.id, userId: actor.userId });
      if (!enrollment || enrollment.status !== EnrollmentStatus.APPROVED) {
        throw new UserNotEnrolledError();
      }

      // ── PHASE 6: Minimum bid ────────────────────────────────
      const policy = session.rules.bidIncrementPolicy ?? DEFAULT_SESSION_RULES.bidIncrementPolicy;
      const minimumBid = minimumNextBid(policy, lot);
      if (amount.lessThan(minimumBid)) {
        throw new InsufficientBidError(toMoney(minimumBid));
      }

      // ── PHASE 7: Demote the previous winner, then insert ─────
      const previous = await m.findOne(Bid, { sessionItemId, status: BidStatus.WINNING });
      if (previous) {
        previous.status = BidStatus.OUTBID;
        await m.save(previous);
      }

      const bid = await m.insert(Bid, {
        sessionId: session.id,
        sessionItemId,
        bidderId: actor.userId,
        amount: toMoney(amount),
        status: BidStatus.WINNING,
        idempotencyKey: key,
        placedAt: now,
      });

      // ── PHASE 8: Lot summary, same transaction ──────────────
      lot.currentHighestBid = bid.amount;
      lot.currentWinnerId = actor.userId;
      lot.bidCount += 1;
      await m.save(lot);

      // ── PHASE 9: Anti-sniping extension ─────────────────────
      const rules = { ...DEFAULT_SESSION_RULES, ...session.rules };
      let extendedUntil: Date | null = null;
      if (
        rules.antiSnipingEnabled &&
        session.endAt.getTime() - now.getTime() <= rules.antiSnipingTriggerSeconds * 1000
      ) {
        extendedUntil = new Date(session.endAt.getTime() + rules.antiSnipingExtensionSeconds * 1000);
        session.endAt = extendedUntil;
        await m.save(session);
      }

      return { bid, extendedUntil };
    });
  }
}
