import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { NotificationType, UserRole } from '@gemhouse/shared';
import { AUCTION_STORE, AuctionStore } from '../../../database/auction-store';
import { InMemoryAuctionStore } from '../../../../test/in-memory-auction-store';
import { ALICE, BOB } from '../../../../test/fixtures';
import { User } from '../../auth/entities/user.entity';
import { Notification } from '../entities/notification.entity';
import { NotificationEvent, NotificationService } from './notification.service';

const submitted: NotificationEvent = {
  type: NotificationType.ITEM_SUBMITTED,
  sellRequestId: 'sr-1',
  itemTitle: 'Pearl necklace',
};

const rejected: NotificationEvent = {
  type: NotificationType.ITEM_REJECTED,
  sellRequestId: 'sr-2',
  itemTitle: 'Jade bangle',
  reason: 'Cracked',
};

async function compile(store: AuctionStore): Promise<NotificationService> {
  const moduleRef = await Test.createTestingModule({
    providers: [NotificationService, { provide: AUCTION_STORE, useValue: store }],
  }).compile();
  return moduleRef.get(NotificationService);
}

describe('NotificationService', () => {
  let store: InMemoryAuctionStore;
  let service: NotificationService;

  beforeEach(async () => {
    store = new InMemoryAuctionStore();
    service = await compile(store);
  });

  describe('notify', () => {
    it('stores one unread row per recipient', async () => {
      const rows = await service.notify([ALICE.userId, BOB.userId], submitted);

      expect(rows.map((n) => n.recipientId)).toEqual([ALICE.userId, BOB.userId]);
      expect(store.all(Notification)).toHaveLength(2);
      expect(rows[0]).toMatchObject({
        type: NotificationType.ITEM_SUBMITTED,
        title: 'Sell request received',
        message: 'Your sell request for "Pearl necklace" was submitted. Our staff will appraise it shortly.',
        data: { sell_request_id: 'sr-1' },
        isRead: false,
        readAt: null,
      });
    });

    it('opens no transaction without recipients', async () => {
      await expect(service.notify([], submitted)).resolves.toEqual([]);
      expect(store.transactionCount).toBe(0);
    });

    it('logs a failed write instead of throwing', async () => {
      const failing: AuctionStore = {
        manager: store.manager,
        transaction: jest.fn().mockRejectedValue(new Error('connection reset')),
      };
      const logged = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      try {
        const isolated = await compile(failing);

        await expect(isolated.notify([ALICE.userId], submitted)).resolves.toEqual([]);
        expect(logged).toHaveBeenCalledWith(
          JSON.stringify({
            event: 'notification_failed',
            type: 'item_submitted',
            recipients: 1,
            error_message: 'connection reset',
          }),
        );
      } finally {
        logged.mockRestore();
      }
    });
  });

  it('fans a role notification out to active holders of that role', async () => {
    const [active, inactive, admin] = await store.transaction(async (m) => [
      await m.insert(User, { email: 'm1@example.test', name: 'Mina', passwordHash: 'hash', role: UserRole.MANAGER }),
      await m.insert(User, {
        email: 'm2@example.test',
        name: 'Omar',
        passwordHash: 'hash',
        role: UserRole.MANAGER,
        isActive: false,
      }),
      await m.insert(User, { email: 'a1@example.test', name: 'Ada', passwordHash: 'hash', role: UserRole.ADMIN }),
    ]);

    await service.notifyRole(UserRole.MANAGER, rejected);

    const recipients = store.all(Notification).map((n) => n.recipientId);
    expect(recipients).toEqual([active.id]);
    expect(recipients).not.toContain(inactive.id);
    expect(recipients).not.toContain(admin.id);
  });

  describe('reading', () => {
    let first: Notification;

    beforeEach(async () => {
      [first] = await service.notify([ALICE.userId], submitted);
      await service.notify([ALICE.userId], rejected);
      await service.notify([BOB.userId], rejected);
    });

    it('counts and lists unread notifications per user', async () => {
      await expect(service.unreadCount(ALICE)).resolves.toEqual({ count: 2 });
      await expect(service.unreadCount(BOB)).resolves.toEqual({ count: 1 });

      const page = await service.list(ALICE, { limit: 1 });
      expect(page.data).toHaveLength(1);
      expect(page.meta).toEqual({ total: 2, page: 1, limit: 1, totalPages: 2 });
    });

    it('marks one notification read for its recipient only', async () => {
      await expect(service.markRead(BOB, first.id)).rejects.toMatchObject({ code: 'NOT_OWNER' });
      await expect(service.markRead(ALICE, '00000000-0000-4000-8000-0000000000ff')).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });

      const read = await service.markRead(ALICE, first.id);
      expect(read.isRead).toBe(true);
      expect(read.readAt).toBeInstanceOf(Date);

      const again = await service.markRead(ALICE, first.id);
      expect(again.readAt?.getTime()).toBe(read.readAt?.getTime());

      await expect(service.unreadCount(ALICE)).resolves.toEqual({ count: 1 });
      const unread = await service.list(ALICE, {}, true);
      expect(unread.data.map((n) => n.type)).toEqual([NotificationType.ITEM_REJECTED]);
      expect((await service.list(ALICE, {})).meta.total).toBe(2);
    });

    it('marks everything read for the caller', async () => {
      await service.markRead(ALICE, first.id);

      await expect(service.markAllRead(ALICE)).resolves.toEqual({ updated: 1 });
      await expect(service.unreadCount(ALICE)).resolves.toEqual({ count: 0 });
      await expect(service.unreadCount(BOB)).resolves.toEqual({ count: 1 });
      await expect(service.markAllRead(ALICE)).resolves.toEqual({ updated: 0 });
    });
  });
});
