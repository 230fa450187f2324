import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { Decimal } from 'decimal.js';
import {
  Actor,
  assertRole,
  BidStatus,
  BusinessRuleViolationError,
  ConflictError,
  FeeKind,
  InvalidStateTransitionError,
  NotFoundError,
  PaymentStatus,
  PayoutStatus,
  SessionItemStatus,
  SessionStatus,
  UserRole,
} from '@gemhouse/shared';
import { AUCTION_STORE, AuctionStore, StoreManager } from '../../../database/auction-store';
import { MetricsService } from '../../../metrics/metrics.service';
import { toMoney } from '../../../common/utils/money';
import { AuctionSession } from '../../auctions/entities/auction-session.entity';
import { SessionItem } from '../../auctions/entities/session-item.entity';
import { Bid } from '../../auctions/entities/bid.entity';
import { JewelryItem } from '../../consignment/entities/jewelry-item.entity';
import { FeeSchedule } from '../entities/fee-schedule.entity';
import { Payment } from '../entities/payment.entity';
import { Payout } from '../entities/payout.entity';
import { TransactionFee } from '../entities/transaction-fee.entity';
import { computeSettlementAmounts, resolveFeeRates } from '../utils/fee-calculator';

export interface SettlementResult {
  payment: Payment;
  payout: Payout;
  fees: TransactionFee[];
}

export interface SessionSettlementResult {
  session: AuctionSession;
  settlements: SettlementResult[];
}

export interface SessionSummary {
  sessionId: string;
  status: SessionStatus;
  items: { total: number; sold: number; unsold: number; withdrawn: number };
  totalHammer: string;
  payments: Partial<Record<PaymentStatus, number>>;
  payouts: Partial<Record<PayoutStatus, number>>;
}

const TERMINAL_LOT_STATUSES: SessionItemStatus[] = [
  SessionItemStatus.SOLD,
  SessionItemStatus.UNSOLD,
  SessionItemStatus.WITHDRAWN,
];

/**
 * Turns a SOLD lot into a buyer Payment, a seller Payout and the two fee
 * records. Idempotent per lot: the unique `session_item_id` on payments is
 * the guard, so two concurrent calls produce one settlement and the loser
 * returns the winner's records.
 */
@Injectable()
export class SettlementService {
  private readonly logger = new Logger(SettlementService.name);

  constructor(
    @Inject(AUCTION_STORE) private readonly store: AuctionStore,
    @Optional() @Inject(MetricsService) private readonly metrics?: MetricsService,
  ) {}

  async settle(actor: Actor, sessionItemId: string): Promise<SettlementResult> {
    assertRole(actor, UserRole.STAFF, 'Settling a lot');

    const existing = await this.findExisting(this.store.manager, sessionItemId);
    if (existing) {
      return existing;
    }

    try {
      const result = await this.store.transaction(async (m) => {
        const again = await this.findExisting(m, sessionItemId);
        if (again) {
          return { settlement: again, created: false };
        }
        return { settlement: await this.create(m, sessionItemId), created: true };
      });

      if (result.created) {
        this.metrics?.settlementsCreatedTotal.inc();
        this.logger.log(
          JSON.stringify({
            event: 'lot_settled',
            session_item_id: sessionItemId,
            payment_id: result.settlement.payment.id,
            payout_id: result.settlement.payout.id,
            payment_amount: result.settlement.payment.amount,
            payout_amount: result.settlement.payout.amount,
          }),
        );
      }
      return result.settlement;
    } catch (err) {
      // Lost the race on the unique index: the other transaction committed.
      if (err instanceof ConflictError) {
        const winner = await this.findExisting(this.store.manager, sessionItemId);
        if (winner) {
          this.logger.warn(
            JSON.stringify({ event: 'settlement_race_lost', session_item_id: sessionItemId }),
          );
          return winner;
        }
      }
      throw err;
    }
  }

  async settleSession(actor: Actor, sessionId: string): Promise<SessionSettlementResult> {
    assertRole(actor, UserRole.STAFF, 'Settling a session');

    const session = await this.store.manager.findOne(AuctionSession, { id: sessionId });
    if (!session) {
      throw new NotFoundError('AuctionSession', sessionId);
    }
    if (session.status !== SessionStatus.CLOSED) {
      throw new InvalidStateTransitionError('AuctionSession', session.status, [SessionStatus.CLOSED], 'settle');
    }

    const lots = await this.store.manager.find(SessionItem, {
      where: { sessionId },
      order: { lotNumber: 'ASC' },
    });
    const open = lots.filter((lot) => !TERMINAL_LOT_STATUSES.includes(lot.status));
    if (open.length > 0) {
      throw new BusinessRuleViolationError(
        'LOTS_STILL_OPEN',
        `${open.length} lot(s) have not been closed`,
        { lot_numbers: open.map((lot) => lot.lotNumber) },
      );
    }

    const settlements: SettlementResult[] = [];
    for (const lot of lots) {
      if (lot.status === SessionItemStatus.SOLD) {
        settlements.push(await this.settle(actor, lot.id));
      }
    }

    const settled = await this.store.transaction(async (m) => {
      const locked = await m.findOne(AuctionSession, { id: sessionId }, 'pessimistic_write');
      if (!locked) {
        throw new NotFoundError('AuctionSession', sessionId);
      }
      if (locked.status !== SessionStatus.CLOSED) {
        throw new InvalidStateTransitionError('AuctionSession', locked.status, [SessionStatus.CLOSED], 'settle');
      }
      locked.status = SessionStatus.SETTLED;
      locked.settledAt = new Date();
      return m.save(locked);
    });

    this.metrics?.sessionTransitionsTotal.inc({ from: SessionStatus.CLOSED, to: SessionStatus.SETTLED });
    this.logger.log(
      JSON.stringify({
        event: 'session_settled',
        session_id: sessionId,
        settled_lots: settlements.length,
        actor_id: actor.userId,
      }),
    );
    return { session: settled, settlements };
  }

  async getSummary(actor: Actor, sessionId: string): Promise<SessionSummary> {
    assertRole(actor, UserRole.STAFF, 'Viewing a settlement summary');

    const session = await this.store.manager.findOne(AuctionSession, { id: sessionId });
    if (!session) {
      throw new NotFoundError('AuctionSession', sessionId);
    }

    const lots = await this.store.manager.find(SessionItem, { where: { sessionId } });
    const payments = await this.store.manager.find(Payment, { where: { sessionId } });
    const payouts = await this.store.manager.find(Payout, { where: { sessionId } });

    const sold = lots.filter((lot) => lot.status === SessionItemStatus.SOLD);
    const totalHammer = sold.reduce(
      (sum, lot) => sum.plus(lot.currentHighestBid ?? 0),
      new Decimal(0),
    );

    const paymentCounts: Partial<Record<PaymentStatus, number>> = {};
    for (const payment of payments) {
      paymentCounts[payment.status] = (paymentCounts[payment.status] ?? 0) + 1;
    }
    const payoutCounts: Partial<Record<PayoutStatus, number>> = {};
    for (const payout of payouts) {
      payoutCounts[payout.status] = (payoutCounts[payout.status] ?? 0) + 1;
    }

    return {
      sessionId,
      status: session.status,
      items: {
        total: lots.length,
        sold: sold.length,
        unsold: lots.filter((lot) => lot.status === SessionItemStatus.UNSOLD).length,
        withdrawn: lots.filter((lot) => lot.status === SessionItemStatus.WITHDRAWN).length,
      },
      totalHammer: toMoney(totalHammer),
      payments: paymentCounts,
      payouts: payoutCounts,
    };
  }

  // ── Private helpers ────────────────────────────────────────────

  private async findExisting(m: StoreManager, sessionItemId: string): Promise<SettlementResult | null> {
    const payment = await m.findOne(Payment, { sessionItemId });
    if (!payment) {
      return null;
    }
    const payout = await m.findOne(Payout, { sessionItemId });
    if (!payout) {
      throw new NotFoundError('Payout for lot', sessionItemId);
    }
    const fees = await m.find(TransactionFee, { where: { sessionItemId }, order: { kind: 'ASC' } });
    return { payment, payout, fees };
  }

  private async create(m: StoreManager, sessionItemId: string): Promise<SettlementResult> {
    const lot = await m.findOne(SessionItem, { id: sessionItemId });
    if (!lot) {
      throw new NotFoundError('SessionItem', sessionItemId);
    }
    if (lot.status !== SessionItemStatus.SOLD) {
      throw new BusinessRuleViolationError('ITEM_NOT_SOLD', `Lot ${lot.lotNumber} is ${lot.status}, not sold`, {
        item_status: lot.status,
      });
    }

    const winningBid = await m.findOne(Bid, { sessionItemId, status: BidStatus.WINNING });
    if (!winningBid) {
      throw new BusinessRuleViolationError('NO_WINNING_BID', `Lot ${lot.lotNumber} has no winning bid`);
    }
    const session = await m.findOne(AuctionSession, { id: lot.sessionId });
    if (!session) {
      throw new NotFoundError('AuctionSession', lot.sessionId);
    }
    const jewelry = await m.findOne(JewelryItem, { id: lot.jewelryItemId });
    if (!jewelry) {
      throw new NotFoundError('JewelryItem', lot.jewelryItemId);
    }

    const [schedule] = await m.find(FeeSchedule, { where: { isActive: true }, take: 1 });
    const rates = resolveFeeRates(schedule ?? null, session.rules);
    const amounts = computeSettlementAmounts(winningBid.amount, rates);

    const payment = await m.insert(Payment, {
      buyerId: winningBid.bidderId,
      sessionId: lot.sessionId,
      sessionItemId,
      amount: amounts.paymentAmount,
      hammerPrice: amounts.hammerPrice,
      buyerPremium: amounts.buyerPremium,
      status: PaymentStatus.PENDING,
    });
    const payout = await m.insert(Payout, {
      sellerId: jewelry.ownerId,
      sessionId: lot.sessionId,
      sessionItemId,
      amount: amounts.payoutAmount,
      hammerPrice: amounts.hammerPrice,
      sellerCommission: amounts.sellerCommission,
      status: PayoutStatus.PENDING,
    });
    const fees = [
      await m.insert(TransactionFee, {
        sessionItemId,
        userId: winningBid.bidderId,
        kind: FeeKind.BUYER_PREMIUM,
        percentage: rates.buyerPercentage,
        amount: amounts.buyerPremium,
      }),
      await m.insert(TransactionFee, {
        sessionItemId,
        userId: jewelry.ownerId,
        kind: FeeKind.SELLER_COMMISSION,
        percentage: rates.sellerPercentage,
        amount: amounts.sellerCommission,
      }),
    ];

    return { payment, payout, fees };
  }
}
