import {
  AuthorizationError,
  BusinessRuleViolationError,
  ConflictError,
  InvalidStateTransitionError,
  JewelryStatus,
  NotificationType,
  SellRequestStatus,
  UserRole,
  ValidationError,
} from '@gemhouse/shared';
import { ALICE, createWorld, GUEST, MANAGER, SELLER, STAFF, World } from '../../../../test/fixtures';
import { JewelryItem } from '../entities/jewelry-item.entity';
import { SellRequest } from '../entities/sell-request.entity';
import { User } from '../../auth/entities/user.entity';
import { Notification } from '../../notifications/entities/notification.entity';

const ring = {
  title: '  Emerald pendant  ',
  description: 'Platinum chain, 1.4ct emerald',
  photos: ['photos/a.jpg', 'photos/b.jpg'],
};

describe('SellRequestService', () => {
  let world: World;

  beforeEach(async () => {
    world = await createWorld();
  });

  describe('submit', () => {
    it('creates the jewelry item and the request together', async () => {
      const { sellRequest, jewelryItem } = await world.sellRequests.submit(SELLER, { ...ring, weight: '12.5' });

      expect(jewelryItem.title).toBe('Emerald pendant');
      expect(jewelryItem.status).toBe(JewelryStatus.PENDING_APPRAISAL);
      expect(jewelryItem.code).toMatch(/^JWL\d{7}$/);
      expect(jewelryItem.weight).toBe('12.500');
      expect(jewelryItem.ownerId).toBe(SELLER.userId);
      expect(sellRequest.status).toBe(SellRequestStatus.SUBMITTED);
      expect(sellRequest.jewelryItemId).toBe(jewelryItem.id);
      expect(sellRequest.submittedAt).toBeInstanceOf(Date);
    });

    it('validates the payload before touching the store', async () => {
      await expect(world.sellRequests.submit(SELLER, { ...ring, title: '   ' })).rejects.toThrow(
        'title must not be empty',
      );
      await expect(world.sellRequests.submit(SELLER, { ...ring, photos: [] })).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(
        world.sellRequests.submit(SELLER, { ...ring, photos: Array.from({ length: 11 }, (_, i) => `p${i}`) }),
      ).rejects.toThrow('at most 10 photos are allowed');
      await expect(world.sellRequests.submit(SELLER, { ...ring, weight: '0' })).rejects.toThrow(
        'weight must be a positive number of grams',
      );
      await expect(world.sellRequests.submit(SELLER, { ...ring, title: 'x'.repeat(201) })).rejects.toThrow(
        'title must be at most 200 characters',
      );
      expect(world.store.all(SellRequest)).toHaveLength(0);
    });

    it('requires a member', async () => {
      await expect(world.sellRequests.submit(GUEST, ring)).rejects.toBeInstanceOf(AuthorizationError);
    });

    it('flags a second open request for the same seller code', async () => {
      await world.sellRequests.submit(SELLER, { ...ring, code: 'jwl0000001' });

      await expect(world.sellRequests.submit(SELLER, { ...ring, code: 'JWL0000001' })).rejects.toMatchObject({
        code: 'DUPLICATE_OPEN_REQUEST',
      });
      await expect(world.sellRequests.submit(ALICE, { ...ring, code: 'JWL0000001' })).rejects.toMatchObject({
        code: 'DUPLICATE_CODE',
      });
      expect(world.store.all(JewelryItem)).toHaveLength(1);
    });

    it('treats a code reused after rejection as a plain conflict', async () => {
      const { sellRequest } = await world.sellRequests.submit(SELLER, { ...ring, code: 'JWL0000002' });
      await world.sellRequests.reject(SELLER, sellRequest.id, { reason: 'changed my mind' });

      const attempt = world.sellRequests.submit(SELLER, { ...ring, code: 'JWL0000002' });
      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(attempt).rejects.not.toBeInstanceOf(BusinessRuleViolationError);
    });
  });

  describe('workflow', () => {
    it('walks the full sequence and stamps every stage', async () => {
      const { sellRequest, jewelryItem } = await world.sellRequests.submit(SELLER, ring);

      await world.sellRequests.preliminaryAppraise(STAFF, sellRequest.id, { estimatedPrice: '4800' });
      await world.sellRequests.markReceived(STAFF, sellRequest.id, { notes: 'in vault B' });
      await world.sellRequests.finalAppraise(STAFF, sellRequest.id, {
        estimatedPrice: '5000',
        reservePrice: '4000',
      });
      await world.sellRequests.managerApprove(MANAGER, sellRequest.id, { notes: 'ok' });
      const accepted = await world.sellRequests.sellerAccept(SELLER, sellRequest.id);

      expect(accepted.status).toBe(SellRequestStatus.SELLER_ACCEPTED);
      expect(accepted.appraisedAt).toBeInstanceOf(Date);
      expect(accepted.receivedAt).toBeInstanceOf(Date);
      expect(accepted.finalAppraisedAt).toBeInstanceOf(Date);
      expect(accepted.approvedAt).toBeInstanceOf(Date);
      expect(accepted.acceptedAt).toBeInstanceOf(Date);
      expect(accepted.staffNotes).toBe('in vault B');
      expect(accepted.managerNotes).toBe('ok');

      const item = await world.jewelry.findById(jewelryItem.id);
      expect(item.status).toBe(JewelryStatus.APPROVED);
      expect(item.estimatedPrice).toBe('5000.00');
      expect(item.reservePrice).toBe('4000.00');
    });

    it('rejects an out-of-sequence step and leaves the record unchanged', async () => {
      const { sellRequest } = await world.sellRequests.submit(SELLER, ring);

      let caught: unknown;
      try {
        await world.sellRequests.managerApprove(MANAGER, sellRequest.id);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(InvalidStateTransitionError);
      if (caught instanceof InvalidStateTransitionError) {
        expect(caught.current).toBe(SellRequestStatus.SUBMITTED);
        expect(caught.expected).toEqual([SellRequestStatus.FINAL_APPRAISED]);
        expect(caught.getStatus()).toBe(403);
      }

      const [stored] = world.store.all(SellRequest);
      expect(stored.status).toBe(SellRequestStatus.SUBMITTED);
      expect(stored.approvedAt).toBeNull();
    });

    it('refuses to approve an item without a positive appraisal', async () => {
      const { sellRequest, jewelryItem } = await world.sellRequests.submit(SELLER, ring);
      await world.sellRequests.preliminaryAppraise(STAFF, sellRequest.id, { estimatedPrice: '100' });
      await world.sellRequests.markReceived(STAFF, sellRequest.id);
      await world.sellRequests.finalAppraise(STAFF, sellRequest.id, { estimatedPrice: '100' });

      // Price cleared out of band.
      const item = await world.jewelry.findById(jewelryItem.id);
      item.estimatedPrice = null;
      await world.store.manager.save(item);

      await expect(world.sellRequests.managerApprove(MANAGER, sellRequest.id)).rejects.toMatchObject({
        code: 'MISSING_APPRAISAL',
      });
      const [stored] = world.store.all(SellRequest);
      expect(stored.status).toBe(SellRequestStatus.FINAL_APPRAISED);
      expect((await world.jewelry.findById(jewelryItem.id)).status).toBe(JewelryStatus.APPRAISED);
    });

    it('gates each step by role', async () => {
      const { sellRequest } = await world.sellRequests.submit(SELLER, ring);

      await expect(
        world.sellRequests.preliminaryAppraise(SELLER, sellRequest.id, { estimatedPrice: '10' }),
      ).rejects.toMatchObject({ code: 'INSUFFICIENT_PERMISSIONS' });

      await world.sellRequests.preliminaryAppraise(STAFF, sellRequest.id, { estimatedPrice: '10' });
      await world.sellRequests.markReceived(STAFF, sellRequest.id);
      await world.sellRequests.finalAppraise(STAFF, sellRequest.id, { estimatedPrice: '10' });

      await expect(world.sellRequests.managerApprove(STAFF, sellRequest.id)).rejects.toBeInstanceOf(
        AuthorizationError,
      );
      await world.sellRequests.managerApprove(MANAGER, sellRequest.id);

      await expect(world.sellRequests.sellerAccept(ALICE, sellRequest.id)).rejects.toMatchObject({
        code: 'NOT_OWNER',
      });
    });

    it('rejects with a reason and returns the item', async () => {
      const { sellRequest, jewelryItem } = await world.sellRequests.submit(SELLER, ring);
      const rejected = await world.sellRequests.reject(STAFF, sellRequest.id, { reason: 'Not gold' });

      expect(rejected.status).toBe(SellRequestStatus.REJECTED);
      expect(rejected.rejectionReason).toBe('Not gold');
      expect(rejected.rejectedAt).toBeInstanceOf(Date);
      expect((await world.jewelry.findById(jewelryItem.id)).status).toBe(JewelryStatus.RETURNED);

      await expect(
        world.sellRequests.preliminaryAppraise(STAFF, sellRequest.id, { estimatedPrice: '10' }),
      ).rejects.toBeInstanceOf(InvalidStateTransitionError);
      await expect(world.sellRequests.reject(STAFF, sellRequest.id, { reason: 'again' })).rejects.toBeInstanceOf(
        InvalidStateTransitionError,
      );
    });

    it('lets only staff or the seller reject', async () => {
      const { sellRequest } = await world.sellRequests.submit(SELLER, ring);
      await expect(world.sellRequests.reject(ALICE, sellRequest.id, { reason: 'spite' })).rejects.toBeInstanceOf(
        AuthorizationError,
      );
    });
  });

  describe('reads', () => {
    it('scopes members to their own requests', async () => {
      const mine = await world.sellRequests.submit(SELLER, ring);
      await world.sellRequests.submit(ALICE, ring);

      const page = await world.sellRequests.list(SELLER, { sellerId: ALICE.userId }, {});
      expect(page.data.map((r) => r.id)).toEqual([mine.sellRequest.id]);
      expect(page.meta).toEqual({ total: 1, page: 1, limit: 20, totalPages: 1 });

      const all = await world.sellRequests.list(STAFF, {}, {});
      expect(all.meta.total).toBe(2);

      await expect(world.sellRequests.findById(ALICE, mine.sellRequest.id)).rejects.toMatchObject({
        code: 'NOT_OWNER',
      });
      const found = await world.sellRequests.findById(STAFF, mine.sellRequest.id);
      expect(found.jewelryItem.id).toBe(mine.jewelryItem.id);
    });
  });

  describe('notifications', () => {
    function inbox(userId: string): Notification[] {
      return world.store.all(Notification).filter((n) => n.recipientId === userId);
    }

    it('tells the seller about each stage and the managers about a pending approval', async () => {
      const manager = await world.store.transaction((m) =>
        m.insert(User, { email: 'manager@example.test', name: 'Mara', passwordHash: 'hash', role: UserRole.MANAGER }),
      );
      const { sellRequest } = await world.sellRequests.submit(SELLER, ring);
      await world.sellRequests.preliminaryAppraise(STAFF, sellRequest.id, { estimatedPrice: '4000' });
      await world.sellRequests.markReceived(STAFF, sellRequest.id);
      await world.sellRequests.finalAppraise(STAFF, sellRequest.id, { estimatedPrice: '4500' });
      await world.sellRequests.managerApprove(MANAGER, sellRequest.id);

      const seller = inbox(SELLER.userId);
      expect(seller.map((n) => n.type).sort()).toEqual([
        NotificationType.ITEM_APPROVED,
        NotificationType.ITEM_SUBMITTED,
        NotificationType.PRELIMINARY_VALUATION,
      ]);
      expect(seller.find((n) => n.type === NotificationType.PRELIMINARY_VALUATION)).toMatchObject({
        title: 'Preliminary valuation ready',
        message: '"Emerald pendant" was valued at 4000.00. Please bring the piece in for the final appraisal.',
        data: { sell_request_id: sellRequest.id, price: '4000.00' },
        isRead: false,
      });
      expect(seller.find((n) => n.type === NotificationType.ITEM_APPROVED)?.data).toEqual({
        sell_request_id: sellRequest.id,
        price: '4500.00',
      });

      expect(inbox(manager.id)).toEqual([
        expect.objectContaining({
          type: NotificationType.MANAGER_APPROVAL_NEEDED,
          message: 'The final valuation of "Emerald pendant" (4500.00) needs a manager\'s approval.',
        }),
      ]);
    });

    it('tells the seller why a request was rejected', async () => {
      const { sellRequest } = await world.sellRequests.submit(SELLER, ring);
      await world.sellRequests.reject(STAFF, sellRequest.id, { reason: 'Not gold' });

      expect(inbox(SELLER.userId).find((n) => n.type === NotificationType.ITEM_REJECTED)?.message).toBe(
        'Your sell request for "Emerald pendant" was rejected: Not gold',
      );
    });

    it('sends nothing for a refused transition', async () => {
      const { sellRequest } = await world.sellRequests.submit(SELLER, ring);
      await expect(world.sellRequests.managerApprove(MANAGER, sellRequest.id)).rejects.toBeInstanceOf(
        InvalidStateTransitionError,
      );

      expect(inbox(SELLER.userId).map((n) => n.type)).toEqual([NotificationType.ITEM_SUBMITTED]);
    });
  });
});
