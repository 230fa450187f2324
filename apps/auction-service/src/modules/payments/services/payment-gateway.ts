import { Injectable, Logger } from '@nestjs/common';
import { PaymentMethod } from '@gemhouse/shared';

// ── Gateway contract ──────────────────────────────────────────

export interface GatewayResult {
  success: boolean;
  transactionId: string | null;
  error: string | null;
  raw?: Record<string, unknown>;
}

export interface VerifyResult {
  verified: boolean;
  status: string;
  raw?: Record<string, unknown>;
}

export interface PaymentGateway {
  processPayment(
    amount: string,
    method: PaymentMethod,
    details: Record<string, unknown>,
  ): Promise<GatewayResult>;
  processRefund(transactionId: string, amount: string): Promise<GatewayResult>;
  verifyPayment(transactionId: string): Promise<VerifyResult>;
}

// ── DI Token ──────────────────────────────────────────────────

export const PAYMENT_GATEWAY = Symbol('PAYMENT_GATEWAY');

// ── Timeout wrapper ───────────────────────────────────────────

export class GatewayTimeoutError extends Error {
  constructor(operationMs: number) {
    super(`Payment gateway call timed out after ${operationMs}ms`);
    this.name = 'GatewayTimeoutError';
  }
}

export function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new GatewayTimeoutError(ms)), ms);
    promise.then(
      (val) => { clearTimeout(timer); resolve(val); },
      (err) => { clearTimeout(timer); reject(err); },
    );
  });
}

// ── Deterministic implementation ──────────────────────────────

/**
 * Always succeeds. Transaction ids are sequential so that repeated runs
 * produce the same records.
 */
@Injectable()
export class MockPaymentGateway implements PaymentGateway {
  private readonly logger = new Logger(MockPaymentGateway.name);
  private sequence = 0;

  async processPayment(
    amount: string,
    method: PaymentMethod,
    _details: Record<string, unknown>,
  ): Promise<GatewayResult> {
    const transactionId = this.nextId('txn');
    this.logger.debug(
      JSON.stringify({ event: 'gateway_payment_request', amount, method, transaction_id: transactionId }),
    );
    return { success: true, transactionId, error: null, raw: { status: 'approved', amount, method } };
  }

  async processRefund(transactionId: string, amount: string): Promise<GatewayResult> {
    const refundId = this.nextId('rfd');
    this.logger.debug(
      JSON.stringify({ event: 'gateway_refund_request', transaction_id: transactionId, amount }),
    );
    return {
      success: true,
      transactionId: refundId,
      error: null,
      raw: { status: 'refunded', original_transaction_id: transactionId, amount },
    };
  }

  async verifyPayment(transactionId: string): Promise<VerifyResult> {
    return { verified: true, status: 'completed', raw: { transaction_id: transactionId } };
  }

  private nextId(prefix: string): string {
    this.sequence += 1;
    return `mock_${prefix}_${this.sequence.toString().padStart(8, '0')}`;
  }
}
