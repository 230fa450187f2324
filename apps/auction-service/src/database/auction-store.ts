import { ObjectLiteral } from 'typeorm';

export type EntityClass<E extends ObjectLiteral> = new () => E;

/** Equality filter; a `null` value matches IS NULL. */
export type Where<E> = { [K in keyof E]?: E[K] };

export type LockMode = 'pessimistic_write' | 'pessimistic_read';

export type ColumnOf<E> = keyof E & string;

export interface FindOptions<E extends ObjectLiteral> {
  where?: Where<E>;
  /** Defaults to `createdAt DESC`. */
  order?: { [K in ColumnOf<E>]?: 'ASC' | 'DESC' };
  skip?: number;
  take?: number;
  /** Case-insensitive substring match on any of the columns. */
  search?: { columns: ColumnOf<E>[]; term: string };
  /** Inclusive numeric bounds on a decimal column. */
  range?: { column: ColumnOf<E>; min?: string; max?: string };
  lock?: LockMode;
}

/**
 * The unit of work handed to services. Inside `AuctionStore.transaction`
 * every call runs on the same connection and locks are held until commit.
 */
export interface StoreManager {
  findOne<E extends ObjectLiteral>(
    entity: EntityClass<E>,
    where: Where<E>,
    lock?: LockMode,
  ): Promise<E | null>;
  find<E extends ObjectLiteral>(entity: EntityClass<E>, options?: FindOptions<E>): Promise<E[]>;
  findAndCount<E extends ObjectLiteral>(
    entity: EntityClass<E>,
    options?: FindOptions<E>,
  ): Promise<[E[], number]>;
  count<E extends ObjectLiteral>(entity: EntityClass<E>, where?: Where<E>): Promise<number>;
  maximum<E extends ObjectLiteral>(
    entity: EntityClass<E>,
    column: ColumnOf<E>,
    where?: Where<E>,
  ): Promise<number | null>;
  insert<E extends ObjectLiteral>(entity: EntityClass<E>, values: Partial<E>): Promise<E>;
  save<E extends ObjectLiteral>(record: E): Promise<E>;
}

export interface AuctionStore {
  /** Autocommit reads and writes outside any transaction. */
  readonly manager: StoreManager;
  /**
   * Runs `work` in one transaction on a dedicated connection. Commits when
   * it resolves, rolls back when it throws, and releases the connection
   * either way. Unique violations surface as ConflictError, serialization
   * failures and deadlocks as ConcurrencyError.
   */
  transaction<T>(work: (manager: StoreManager) => Promise<T>): Promise<T>;
}

export const AUCTION_STORE = Symbol('AUCTION_STORE');
