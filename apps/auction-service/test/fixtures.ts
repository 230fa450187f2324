import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { Actor, EnrollmentStatus, UserRole } from '@gemhouse/shared';
import { SellRequestService } from '../src/modules/consignment/services/sell-request.service';
import { JewelryService } from '../src/modules/consignment/services/jewelry.service';
import { SessionService, LotPricingInput } from '../src/modules/auctions/services/session.service';
import { BidService } from '../src/modules/auctions/services/bid.service';
import { EnrollmentService } from '../src/modules/auctions/services/enrollment.service';
import { SettlementService } from '../src/modules/payments/services/settlement.service';
import { PaymentService } from '../src/modules/payments/services/payment.service';
import { PAYMENT_GATEWAY } from '../src/modules/payments/services/payment-gateway';
import { NotificationService } from '../src/modules/notifications/services/notification.service';
import { AUCTION_STORE } from '../src/database/auction-store';
import { SessionRules, AuctionSession } from '../src/modules/auctions/entities/auction-session.entity';
import { SessionItem } from '../src/modules/auctions/entities/session-item.entity';
import { SellRequest } from '../src/modules/consignment/entities/sell-request.entity';
import { Enrollment } from '../src/modules/auctions/entities/enrollment.entity';
import { InMemoryAuctionStore } from './in-memory-auction-store';
import { ScriptedPaymentGateway } from './scripted-payment-gateway';

export const ADMIN: Actor = { userId: '00000000-0000-4000-8000-00000000000a', role: UserRole.ADMIN };
export const MANAGER: Actor = { userId: '00000000-0000-4000-8000-00000000000b', role: UserRole.MANAGER };
export const STAFF: Actor = { userId: '00000000-0000-4000-8000-00000000000c', role: UserRole.STAFF };
export const SELLER: Actor = { userId: '00000000-0000-4000-8000-000000000001', role: UserRole.MEMBER };
export const ALICE: Actor = { userId: '00000000-0000-4000-8000-000000000002', role: UserRole.MEMBER };
export const BOB: Actor = { userId: '00000000-0000-4000-8000-000000000003', role: UserRole.MEMBER };
export const GUEST: Actor = { userId: '00000000-0000-4000-8000-000000000004', role: UserRole.GUEST };

const HOUR = 60 * 60 * 1000;

export interface World {
  store: InMemoryAuctionStore;
  gateway: ScriptedPaymentGateway;
  config: ConfigService;
  sellRequests: SellRequestService;
  jewelry: JewelryService;
  sessions: SessionService;
  bids: BidService;
  enrollments: EnrollmentService;
  settlement: SettlementService;
  payments: PaymentService;
  notifications: NotificationService;
}

/**
 * The service graph resolved by Nest from an in-memory store and a
 * scripted gateway. Metrics are left out, so every `@Optional()` metrics
 * hook resolves to undefined.
 */
export async function createWorld(settings: Record<string, unknown> = {}): Promise<World> {
  const store = new InMemoryAuctionStore();
  const gateway = new ScriptedPaymentGateway();
  const config = new ConfigService({ BID_RETRY_ATTEMPTS: 3, GATEWAY_TIMEOUT_MS: 50, ...settings });

  const moduleRef = await Test.createTestingModule({
    providers: [
      { provide: AUCTION_STORE, useValue: store },
      { provide: PAYMENT_GATEWAY, useValue: gateway },
      { provide: ConfigService, useValue: config },
      NotificationService,
      SellRequestService,
      JewelryService,
      SettlementService,
      BidService,
      SessionService,
      EnrollmentService,
      PaymentService,
    ],
  }).compile();

  return {
    store,
    gateway,
    config,
    sellRequests: moduleRef.get(SellRequestService),
    jewelry: moduleRef.get(JewelryService),
    sessions: moduleRef.get(SessionService),
    bids: moduleRef.get(BidService),
    enrollments: moduleRef.get(EnrollmentService),
    settlement: moduleRef.get(SettlementService),
    payments: moduleRef.get(PaymentService),
    notifications: moduleRef.get(NotificationService),
  };
}

export interface ApprovedItem {
  sellRequest: SellRequest;
  jewelryItemId: string;
}

/** Walks a fresh submission all the way to MANAGER_APPROVED. */
export async function approvedItem(
  world: World,
  prices: { estimatedPrice?: string; reservePrice?: string; title?: string } = {},
  seller: Actor = SELLER,
): Promise<ApprovedItem> {
  const { sellRequest, jewelryItem } = await world.sellRequests.submit(seller, {
    title: prices.title ?? 'Sapphire ring',
    description: '18k white gold, 2.1ct sapphire',
    photos: ['photos/front.jpg'],
  });
  const estimatedPrice = prices.estimatedPrice ?? '5000.00';
  await world.sellRequests.preliminaryAppraise(STAFF, sellRequest.id, { estimatedPrice });
  await world.sellRequests.markReceived(STAFF, sellRequest.id);
  await world.sellRequests.finalAppraise(STAFF, sellRequest.id, {
    estimatedPrice,
    reservePrice: prices.reservePrice,
  });
  const approved = await world.sellRequests.managerApprove(MANAGER, sellRequest.id);
  return { sellRequest: approved, jewelryItemId: jewelryItem.id };
}

export async function draftSession(world: World, rules: Partial<SessionRules> = {}): Promise<AuctionSession> {
  const now = Date.now();
  return world.sessions.createSession(MANAGER, {
    name: 'Evening jewelry sale',
    startAt: new Date(now + HOUR),
    endAt: new Date(now + 3 * HOUR),
    rules,
  });
}

export interface OpenLotsOptions {
  rules?: Partial<SessionRules>;
  lots: Array<LotPricingInput & { itemReserve?: string }>;
}

/** Session with the given lots, scheduled and opened. */
export async function openSessionWithLots(
  world: World,
  options: OpenLotsOptions,
): Promise<{ session: AuctionSession; lots: SessionItem[] }> {
  const session = await draftSession(world, options.rules);
  for (const pricing of options.lots) {
    const { sellRequest } = await approvedItem(world, { reservePrice: pricing.itemReserve });
    await world.sessions.addItemToSession(STAFF, session.id, sellRequest.id, pricing);
  }
  await world.sessions.scheduleSession(MANAGER, session.id);
  const opened = await world.sessions.openSession(STAFF, session.id);
  return { session: opened, lots: await world.sessions.listItems(session.id) };
}

export async function enrollApproved(world: World, sessionId: string, bidder: Actor): Promise<Enrollment> {
  const enrollment = await world.enrollments.enroll(bidder, sessionId);
  if (enrollment.status === EnrollmentStatus.APPROVED) {
    return enrollment;
  }
  return world.enrollments.approve(STAFF, enrollment.id);
}
