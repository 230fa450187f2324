import { Injectable } from '@nestjs/common';
import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from 'prom-client';

@Injectable()
export class MetricsService {
  readonly registry: Registry;

  readonly bidsAcceptedTotal: Counter;
  readonly bidRejectionsTotal: Counter;
  readonly sellRequestTransitionsTotal: Counter;
  readonly sessionTransitionsTotal: Counter;
  readonly sessionExtensionsTotal: Counter;
  readonly lotsClosedTotal: Counter;
  readonly settlementsCreatedTotal: Counter;
  readonly notificationsCreatedTotal: Counter;
  readonly gatewayCallsTotal: Counter;
  readonly gatewayCallDurationMs: Histogram;

  constructor() {
    this.registry = new Registry();
    this.registry.setDefaultLabels({ app: 'auction-service' });
    collectDefaultMetrics({ register: this.registry });

    this.bidsAcceptedTotal = new Counter({
      name: 'bids_accepted_total',
      help: 'Total bids admitted as WINNING',
      registers: [this.registry],
    });

    this.bidRejectionsTotal = new Counter({
      name: 'bid_rejections_total',
      help: 'Total bid rejections by reason code',
      labelNames: ['reason_code'] as const,
      registers: [this.registry],
    });

    this.sellRequestTransitionsTotal = new Counter({
      name: 'sell_request_transitions_total',
      help: 'Total sell-request state transitions by from/to status',
      labelNames: ['from', 'to'] as const,
      registers: [this.registry],
    });

    this.sessionTransitionsTotal = new Counter({
      name: 'session_transitions_total',
      help: 'Total auction session state transitions by from/to status',
      labelNames: ['from', 'to'] as const,
      registers: [this.registry],
    });

    this.sessionExtensionsTotal = new Counter({
      name: 'session_extensions_total',
      help: 'Total session end-time extensions triggered by late bids',
      registers: [this.registry],
    });

    this.lotsClosedTotal = new Counter({
      name: 'lots_closed_total',
      help: 'Total lots closed by outcome (sold/unsold)',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });

    this.settlementsCreatedTotal = new Counter({
      name: 'settlements_created_total',
      help: 'Total payment/payout pairs recorded for sold lots',
      registers: [this.registry],
    });

    this.notificationsCreatedTotal = new Counter({
      name: 'notifications_created_total',
      help: 'Total in-app notifications stored by type',
      labelNames: ['type'] as const,
      registers: [this.registry],
    });

    this.gatewayCallsTotal = new Counter({
      name: 'payment_gateway_calls_total',
      help: 'Total payment gateway calls by operation and outcome',
      labelNames: ['operation', 'outcome'] as const,
      registers: [this.registry],
    });

    this.gatewayCallDurationMs = new Histogram({
      name: 'payment_gateway_call_duration_ms',
      help: 'Payment gateway call duration in milliseconds',
      labelNames: ['operation'] as const,
      buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000],
      registers: [this.registry],
    });
  }

  /** Text exposition of every metric in this service's registry. */
  render(): Promise<string> {
    return this.registry.metrics();
  }
}
