import { BidStatus, ConcurrencyError } from '@gemhouse/shared';
import { Bid } from '../src/modules/auctions/entities/bid.entity';
import { InMemoryAuctionStore } from './in-memory-auction-store';

const LOT = '00000000-0000-4000-8000-0000000000a1';
const SESSION = '00000000-0000-4000-8000-0000000000b1';

function bid(bidderId: string, amount: string, status: BidStatus, idempotencyKey: string | null = null): Partial<Bid> {
  return { sessionId: SESSION, sessionItemId: LOT, bidderId, amount, status, idempotencyKey, placedAt: new Date() };
}

describe('InMemoryAuctionStore', () => {
  let store: InMemoryAuctionStore;

  beforeEach(() => {
    store = new InMemoryAuctionStore();
  });

  it('fills defaults and generated columns', async () => {
    const row = await store.manager.insert(Bid, { sessionId: SESSION, sessionItemId: LOT, bidderId: 'u1', amount: '10.00', placedAt: new Date() });

    expect(row).toBeInstanceOf(Bid);
    expect(row.id).toEqual(expect.any(String));
    expect(row.status).toBe(BidStatus.VALID);
    expect(row.idempotencyKey).toBeNull();
    expect(row.createdAt).toBeInstanceOf(Date);
  });

  it('enforces the partial index on winning bids only', async () => {
    await store.manager.insert(Bid, bid('u1', '10.00', BidStatus.WINNING));
    await store.manager.insert(Bid, bid('u2', '5.00', BidStatus.OUTBID));

    await expect(store.manager.insert(Bid, bid('u3', '20.00', BidStatus.WINNING))).rejects.toMatchObject({
      code: 'UNIQUE_VIOLATION',
      details: { constraint: 'uq_bids_one_winner' },
    });
  });

  it('lets a demoted winner make room for a new one', async () => {
    const first = await store.manager.insert(Bid, bid('u1', '10.00', BidStatus.WINNING));
    first.status = BidStatus.OUTBID;
    await store.manager.save(first);

    await expect(store.manager.insert(Bid, bid('u2', '20.00', BidStatus.WINNING))).resolves.toBeInstanceOf(Bid);
  });

  it('treats null idempotency keys as distinct', async () => {
    await store.manager.insert(Bid, bid('u1', '10.00', BidStatus.OUTBID));
    await store.manager.insert(Bid, bid('u1', '11.00', BidStatus.OUTBID));
    await store.manager.insert(Bid, bid('u1', '12.00', BidStatus.OUTBID, 'k-1'));

    await expect(store.manager.insert(Bid, bid('u1', '13.00', BidStatus.OUTBID, 'k-1'))).rejects.toMatchObject({
      code: 'UNIQUE_VIOLATION',
    });
  });

  it('discards staged writes when the transaction fails', async () => {
    await expect(
      store.transaction(async (m) => {
        await m.insert(Bid, bid('u1', '10.00', BidStatus.WINNING));
        expect(await m.count(Bid)).toBe(1);
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(store.all(Bid)).toHaveLength(0);
    expect(store.rollbackCount).toBe(1);
  });

  it('hides staged rows from readers outside the transaction until commit', async () => {
    let outside = -1;
    await store.transaction(async (m) => {
      await m.insert(Bid, bid('u1', '10.00', BidStatus.WINNING));
      outside = await store.manager.count(Bid);
    });

    expect(outside).toBe(0);
    expect(await store.manager.count(Bid)).toBe(1);
  });

  it('fails the next commit on request', async () => {
    store.failNextCommit(new ConcurrencyError('serialization failure'));

    await expect(
      store.transaction((m) => m.insert(Bid, bid('u1', '10.00', BidStatus.WINNING))),
    ).rejects.toBeInstanceOf(ConcurrencyError);
    expect(store.all(Bid)).toHaveLength(0);

    await store.transaction((m) => m.insert(Bid, bid('u1', '10.00', BidStatus.WINNING)));
    expect(store.all(Bid)).toHaveLength(1);
  });

  it('orders, pages and ranges', async () => {
    for (const amount of ['30.00', '10.00', '20.00']) {
      await store.manager.insert(Bid, bid('u1', amount, BidStatus.OUTBID));
    }

    const [page, total] = await store.manager.findAndCount(Bid, {
      order: { amount: 'ASC' },
      range: { column: 'amount', min: '15' },
      take: 1,
    });

    expect(total).toBe(2);
    expect(page.map((b) => b.amount)).toEqual(['20.00']);
    expect(await store.manager.maximum(Bid, 'amount')).toBe(30);
  });
});
