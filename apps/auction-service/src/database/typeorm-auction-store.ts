import { Injectable } from '@nestjs/common';
import { DataSource, EntityManager, ObjectLiteral, SelectQueryBuilder } from 'typeorm';
import {
  AuctionStore,
  ColumnOf,
  EntityClass,
  FindOptions,
  LockMode,
  StoreManager,
  Where,
} from './auction-store';
import { translateDriverError } from './pg-errors';

const ALIAS = 'e';

class TypeOrmStoreManager implements StoreManager {
  constructor(
    private readonly em: EntityManager,
    private readonly inTransaction: boolean,
  ) {}

  async findOne<E extends ObjectLiteral>(
    entity: EntityClass<E>,
    where: Where<E>,
    lock?: LockMode,
  ): Promise<E | null> {
    const qb = this.query(entity, { where, lock });
    return this.run(() => qb.getOne());
  }

  async find<E extends ObjectLiteral>(
    entity: EntityClass<E>,
    options: FindOptions<E> = {},
  ): Promise<E[]> {
    const qb = this.query(entity, options);
    return this.run(() => qb.getMany());
  }

  async findAndCount<E extends ObjectLiteral>(
    entity: EntityClass<E>,
    options: FindOptions<E> = {},
  ): Promise<[E[], number]> {
    const qb = this.query(entity, options);
    return this.run(() => qb.getManyAndCount());
  }

  async count<E extends ObjectLiteral>(entity: EntityClass<E>, where?: Where<E>): Promise<number> {
    const qb = this.query(entity, { where });
    return this.run(() => qb.getCount());
  }

  async maximum<E extends ObjectLiteral>(
    entity: EntityClass<E>,
    column: ColumnOf<E>,
    where?: Where<E>,
  ): Promise<number | null> {
    const qb = this.query(entity, { where }).select(`MAX(${ALIAS}.${column})`, 'max');
    const raw = await this.run(() => qb.getRawOne<{ max: string | number | null }>());
    if (!raw || raw.max === null) {
      return null;
    }
    return Number(raw.max);
  }

  async insert<E extends ObjectLiteral>(entity: EntityClass<E>, values: Partial<E>): Promise<E> {
    return this.save(Object.assign(new entity(), values));
  }

  async save<E extends ObjectLiteral>(record: E): Promise<E> {
    return this.run(() => this.em.save(record));
  }

  private query<E extends ObjectLiteral>(
    entity: EntityClass<E>,
    options: FindOptions<E>,
  ): SelectQueryBuilder<E> {
    const qb = this.em.createQueryBuilder(entity, ALIAS);

    for (const [column, value] of Object.entries(options.where ?? {})) {
      if (value === undefined) continue;
      if (value === null) {
        qb.andWhere(`${ALIAS}.${column} IS NULL`);
      } else {
        qb.andWhere(`${ALIAS}.${column} = :w_${column}`, { [`w_${column}`]: value });
      }
    }

    if (options.search && options.search.term.trim().length > 0) {
      const clauses = options.search.columns.map(
        (column) => `${ALIAS}.${column} ILIKE :term`,
      );
      qb.andWhere(`(${clauses.join(' OR ')})`, {
        term: `%${options.search.term.trim()}%`,
      });
    }

    if (options.range) {
      const { column, min, max } = options.range;
      if (min !== undefined) qb.andWhere(`${ALIAS}.${column} >= :rangeMin`, { rangeMin: min });
      if (max !== undefined) qb.andWhere(`${ALIAS}.${column} <= :rangeMax`, { rangeMax: max });
    }

    const order = Object.entries(options.order ?? { createdAt: 'DESC' });
    order.forEach(([column, direction], index) => {
      const dir = direction === 'ASC' ? 'ASC' : 'DESC';
      if (index === 0) qb.orderBy(`${ALIAS}.${column}`, dir);
      else qb.addOrderBy(`${ALIAS}.${column}`, dir);
    });

    if (options.skip !== undefined) qb.skip(options.skip);
    if (options.take !== undefined) qb.take(options.take);

    // Row locks only mean something while a transaction is open.
    if (options.lock && this.inTransaction) {
      qb.setLock(options.lock);
    }

    return qb;
  }

  private async run<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      throw translateDriverError(err);
    }
  }
}

@Injectable()
export class TypeOrmAuctionStore implements AuctionStore {
  readonly manager: StoreManager;

  constructor(private readonly dataSource: DataSource) {
    this.manager = new TypeOrmStoreManager(dataSource.manager, false);
  }

  async transaction<T>(work: (manager: StoreManager) => Promise<T>): Promise<T> {
    const qr = this.dataSource.createQueryRunner();
    await qr.connect();
    await qr.startTransaction();

    try {
      const result = await work(new TypeOrmStoreManager(qr.manager, true));
      await qr.commitTransaction();
      return result;
    } catch (err) {
      if (qr.isTransactionActive) {
        await qr.rollbackTransaction();
      }
      throw translateDriverError(err);
    } finally {
      await qr.release();
    }
  }
}
