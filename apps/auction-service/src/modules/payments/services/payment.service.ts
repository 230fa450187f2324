import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Decimal } from 'decimal.js';
import {
  Actor,
  assertOwner,
  assertRole,
  atLeast,
  BusinessRuleViolationError,
  ConflictError,
  ExternalServiceError,
  InvalidStateTransitionError,
  NotFoundError,
  PaymentMethod,
  PaymentStatus,
  PayoutStatus,
  RefundStatus,
  UserRole,
  ValidationError,
} from '@gemhouse/shared';
import { AUCTION_STORE, AuctionStore } from '../../../database/auction-store';
import { MetricsService } from '../../../metrics/metrics.service';
import { parseMoney, toMoney } from '../../../common/utils/money';
import { PageQuery, Paginated, pageWindow, toPage } from '../../../common/utils/pagination';
import { Payment } from '../entities/payment.entity';
import { Payout } from '../entities/payout.entity';
import { Refund } from '../entities/refund.entity';
import {
  GatewayResult,
  GatewayTimeoutError,
  PAYMENT_GATEWAY,
  PaymentGateway,
  VerifyResult,
  withTimeout,
} from './payment-gateway';

type GatewayOperation = 'payment' | 'payout' | 'refund' | 'verify';

interface Outcome {
  success: boolean;
  transactionId: string | null;
  response: Record<string, unknown>;
}

function outcomeOf(result: GatewayResult): Outcome {
  return {
    success: result.success,
    transactionId: result.transactionId,
    response: result.raw ?? { success: result.success, error: result.error },
  };
}

function failureOf(err: unknown): Outcome {
  return {
    success: false,
    transactionId: null,
    response: { error: err instanceof Error ? err.message : String(err) },
  };
}

const RETRYABLE_PAYMENT: PaymentStatus[] = [PaymentStatus.PENDING, PaymentStatus.FAILED];
const RETRYABLE_PAYOUT: PayoutStatus[] = [PayoutStatus.PENDING, PayoutStatus.FAILED];
const RETRYABLE_REFUND: RefundStatus[] = [RefundStatus.PENDING, RefundStatus.FAILED];

/**
 * Moves payments, payouts and refunds through the gateway.
 *
 * Each operation commits PROCESSING first, calls the gateway with no
 * transaction open, then records the outcome in a second transaction. A
 * gateway timeout or error is recorded as FAILED and surfaces as
 * ExternalServiceError; nothing is retried automatically.
 */
@Injectable()
export class PaymentService {
  private readonly logger = new Logger(PaymentService.name);
  private readonly timeoutMs: number;

  constructor(
    @Inject(AUCTION_STORE) private readonly store: AuctionStore,
    @Inject(PAYMENT_GATEWAY) private readonly gateway: PaymentGateway,
    private readonly config: ConfigService,
    @Optional() @Inject(MetricsService) private readonly metrics?: MetricsService,
  ) {
    this.timeoutMs = this.config.get<number>('GATEWAY_TIMEOUT_MS') ?? 5000;
  }

  async processPayment(
    actor: Actor,
    paymentId: string,
    method: PaymentMethod,
    details: Record<string, unknown> = {},
  ): Promise<Payment> {
    const payment = await this.store.transaction(async (m) => {
      const payment = await m.findOne(Payment, { id: paymentId }, 'pessimistic_write');
      if (!payment) {
        throw new NotFoundError('Payment', paymentId);
      }
      assertOwner(actor, payment.buyerId, 'pay for this lot');
      if (!RETRYABLE_PAYMENT.includes(payment.status)) {
        throw new InvalidStateTransitionError('Payment', payment.status, RETRYABLE_PAYMENT, 'process');
      }
      payment.status = PaymentStatus.PROCESSING;
      payment.method = method;
      return m.save(payment);
    });

    const result = await this.callGateway(
      'payment',
      paymentId,
      () => this.gateway.processPayment(payment.amount, method, details),
      (failure) => this.recordPayment(paymentId, failure),
    );
    return this.recordPayment(paymentId, outcomeOf(result));
  }

  async processPayout(actor: Actor, payoutId: string): Promise<Payout> {
    assertRole(actor, UserRole.STAFF, 'Processing a payout');

    const payout = await this.store.transaction(async (m) => {
      const payout = await m.findOne(Payout, { id: payoutId }, 'pessimistic_write');
      if (!payout) {
        throw new NotFoundError('Payout', payoutId);
      }
      if (!RETRYABLE_PAYOUT.includes(payout.status)) {
        throw new InvalidStateTransitionError('Payout', payout.status, RETRYABLE_PAYOUT, 'process');
      }
      const payment = await m.findOne(Payment, { sessionItemId: payout.sessionItemId });
      if (!payment || payment.status !== PaymentStatus.COMPLETED) {
        throw new BusinessRuleViolationError(
          'PAYMENT_NOT_COMPLETED',
          "The buyer's payment must complete before the seller is paid",
          { payment_status: payment?.status ?? null },
        );
      }
      payout.status = PayoutStatus.PROCESSING;
      return m.save(payout);
    });

    const result = await this.callGateway(
      'payout',
      payoutId,
      () =>
        this.gateway.processPayment(payout.amount, PaymentMethod.BANK_TRANSFER, {
          payout_id: payout.id,
          seller_id: payout.sellerId,
        }),
      (failure) => this.recordPayout(payoutId, failure),
    );
    return this.recordPayout(payoutId, outcomeOf(result));
  }

  async requestRefund(actor: Actor, paymentId: string, reason: string, amount?: string): Promise<Refund> {
    assertRole(actor, UserRole.STAFF, 'Requesting a refund');
    const trimmed = reason.trim();
    if (trimmed.length === 0) {
      throw new ValidationError('reason must not be empty', { field: 'reason' });
    }

    try {
      return await this.store.transaction(async (m) => {
        const payment = await m.findOne(Payment, { id: paymentId }, 'pessimistic_write');
        if (!payment) {
          throw new NotFoundError('Payment', paymentId);
        }
        if (payment.status !== PaymentStatus.COMPLETED) {
          throw new InvalidStateTransitionError('Payment', payment.status, [PaymentStatus.COMPLETED], 'refund');
        }

        const refundAmount = amount !== undefined ? parseMoney(amount, 'amount') : new Decimal(payment.amount);
        if (refundAmount.lessThanOrEqualTo(0) || refundAmount.greaterThan(payment.amount)) {
          throw new ValidationError(`amount must be between 0.01 and ${payment.amount}`, { field: 'amount' });
        }

        if ((await m.count(Refund, { paymentId })) > 0) {
          throw new ConflictError('A refund already exists for this payment', 'REFUND_EXISTS', {
            payment_id: paymentId,
          });
        }

        return m.insert(Refund, {
          paymentId,
          amount: toMoney(refundAmount),
          reason: trimmed,
          status: RefundStatus.PENDING,
          requestedBy: actor.userId,
        });
      });
    } catch (err) {
      if (err instanceof ConflictError && err.code === 'UNIQUE_VIOLATION') {
        throw new ConflictError('A refund already exists for this payment', 'REFUND_EXISTS', {
          payment_id: paymentId,
        });
      }
      throw err;
    }
  }

  async processRefund(actor: Actor, refundId: string): Promise<Refund> {
    assertRole(actor, UserRole.STAFF, 'Processing a refund');

    const { refund, transactionId } = await this.store.transaction(async (m) => {
      const refund = await m.findOne(Refund, { id: refundId }, 'pessimistic_write');
      if (!refund) {
        throw new NotFoundError('Refund', refundId);
      }
      if (!RETRYABLE_REFUND.includes(refund.status)) {
        throw new InvalidStateTransitionError('Refund', refund.status, RETRYABLE_REFUND, 'process');
      }
      const payment = await m.findOne(Payment, { id: refund.paymentId });
      if (!payment) {
        throw new NotFoundError('Payment', refund.paymentId);
      }
      if (payment.status !== PaymentStatus.COMPLETED || payment.gatewayTransactionId === null) {
        throw new BusinessRuleViolationError(
          'PAYMENT_NOT_REFUNDABLE',
          'Only a completed gateway payment can be refunded',
          { payment_status: payment.status },
        );
      }
      refund.status = RefundStatus.PROCESSING;
      return { refund: await m.save(refund), transactionId: payment.gatewayTransactionId };
    });

    const result = await this.callGateway(
      'refund',
      refundId,
      () => this.gateway.processRefund(transactionId, refund.amount),
      (failure) => this.recordRefund(refundId, failure),
    );
    return this.recordRefund(refundId, outcomeOf(result));
  }

  async verifyPayment(actor: Actor, paymentId: string): Promise<VerifyResult & { paymentId: string }> {
    const payment = await this.store.manager.findOne(Payment, { id: paymentId });
    if (!payment) {
      throw new NotFoundError('Payment', paymentId);
    }
    if (!atLeast(actor.role, UserRole.STAFF)) {
      assertOwner(actor, payment.buyerId, 'verify this payment');
    }
    const transactionId = payment.gatewayTransactionId;
    if (transactionId === null) {
      throw new BusinessRuleViolationError('NO_GATEWAY_TRANSACTION', 'Payment has not reached the gateway yet');
    }
    const result = await this.callGateway('verify', paymentId, () => this.gateway.verifyPayment(transactionId));
    return { ...result, paymentId };
  }

  async listPayments(actor: Actor, query: PageQuery, buyerId?: string): Promise<Paginated<Payment>> {
    const window = pageWindow(query);
    const owner = buyerId !== undefined && atLeast(actor.role, UserRole.STAFF) ? buyerId : actor.userId;
    const [data, total] = await this.store.manager.findAndCount(Payment, {
      where: { buyerId: owner },
      skip: window.skip,
      take: window.limit,
    });
    return toPage(data, total, window);
  }

  async listPayouts(actor: Actor, query: PageQuery, sellerId?: string): Promise<Paginated<Payout>> {
    const window = pageWindow(query);
    const owner = sellerId !== undefined && atLeast(actor.role, UserRole.STAFF) ? sellerId : actor.userId;
    const [data, total] = await this.store.manager.findAndCount(Payout, {
      where: { sellerId: owner },
      skip: window.skip,
      take: window.limit,
    });
    return toPage(data, total, window);
  }

  // ── Private helpers ────────────────────────────────────────────

  /**
   * Runs one gateway call under the configured timeout. On failure the raw
   * gateway error goes to `recordFailure` before the ExternalServiceError
   * is raised.
   */
  private async callGateway<T>(
    operation: GatewayOperation,
    recordId: string,
    call: () => Promise<T>,
    recordFailure?: (failure: Outcome) => Promise<unknown>,
  ): Promise<T> {
    const started = Date.now();
    try {
      const result = await withTimeout(call(), this.timeoutMs);
      this.metrics?.gatewayCallsTotal.inc({ operation, outcome: 'ok' });
      return result;
    } catch (err) {
      const timedOut = err instanceof GatewayTimeoutError;
      const message = err instanceof Error ? err.message : String(err);
      this.metrics?.gatewayCallsTotal.inc({ operation, outcome: timedOut ? 'timeout' : 'error' });
      this.logger.warn(
        JSON.stringify({
          event: timedOut ? 'gateway_timeout' : 'gateway_error',
          operation,
          record_id: recordId,
          timeout_ms: this.timeoutMs,
          error_message: message,
        }),
      );
      if (recordFailure) {
        await recordFailure(failureOf(err));
      }
      throw new ExternalServiceError('payment_gateway', `Payment gateway ${operation} failed: ${message}`, {
        operation,
        timed_out: timedOut,
      });
    } finally {
      this.metrics?.gatewayCallDurationMs.observe({ operation }, Date.now() - started);
    }
  }

  private async recordPayment(paymentId: string, outcome: Outcome): Promise<Payment> {
    const payment = await this.store.transaction(async (m) => {
      const payment = await m.findOne(Payment, { id: paymentId }, 'pessimistic_write');
      if (!payment) {
        throw new NotFoundError('Payment', paymentId);
      }
      payment.status = outcome.success ? PaymentStatus.COMPLETED : PaymentStatus.FAILED;
      payment.gatewayResponse = outcome.response;
      if (outcome.success) {
        payment.gatewayTransactionId = outcome.transactionId;
        payment.paidAt = new Date();
      }
      return m.save(payment);
    });
    this.logOutcome('payment', paymentId, payment.status);
    return payment;
  }

  private async recordPayout(payoutId: string, outcome: Outcome): Promise<Payout> {
    const payout = await this.store.transaction(async (m) => {
      const payout = await m.findOne(Payout, { id: payoutId }, 'pessimistic_write');
      if (!payout) {
        throw new NotFoundError('Payout', payoutId);
      }
      payout.status = outcome.success ? PayoutStatus.COMPLETED : PayoutStatus.FAILED;
      payout.gatewayResponse = outcome.response;
      if (outcome.success) {
        payout.gatewayTransactionId = outcome.transactionId;
        payout.paidAt = new Date();
      }
      return m.save(payout);
    });
    this.logOutcome('payout', payoutId, payout.status);
    return payout;
  }

  private async recordRefund(refundId: string, outcome: Outcome): Promise<Refund> {
    const refund = await this.store.transaction(async (m) => {
      const refund = await m.findOne(Refund, { id: refundId }, 'pessimistic_write');
      if (!refund) {
        throw new NotFoundError('Refund', refundId);
      }
      refund.status = outcome.success ? RefundStatus.COMPLETED : RefundStatus.FAILED;
      refund.gatewayResponse = outcome.response;
      if (outcome.success) {
        refund.gatewayRefundId = outcome.transactionId;
        refund.refundedAt = new Date();

        const payment = await m.findOne(Payment, { id: refund.paymentId }, 'pessimistic_write');
        if (!payment) {
          throw new NotFoundError('Payment', refund.paymentId);
        }
        payment.status = PaymentStatus.REFUNDED;
        await m.save(payment);
      }
      return m.save(refund);
    });
    this.logOutcome('refund', refundId, refund.status);
    return refund;
  }

  private logOutcome(kind: GatewayOperation, id: string, status: string): void {
    this.logger.log(JSON.stringify({ event: `${kind}_recorded`, id, status }));
  }
}
