import { randomUUID } from 'crypto';
import { Decimal } from 'decimal.js';
import { getMetadataArgsStorage, ObjectLiteral } from 'typeorm';
import {
  AuctionStore,
  ColumnOf,
  EntityClass,
  FindOptions,
  LockMode,
  StoreManager,
  Where,
} from '../src/database/auction-store';
import { translateDriverError } from '../src/database/pg-errors';

type Row = Record<string, unknown>;
// Keyed by entity constructor.
type Tables = Map<unknown, Map<string, Row>>;

interface UniqueConstraint {
  name: string;
  columns: string[];
  when?: { column: string; value: string };
}

function cloneValue(value: unknown): unknown {
  if (value instanceof Date) return new Date(value.getTime());
  if (Array.isArray(value)) return value.map(cloneValue);
  if (typeof value === 'object' && value !== null) {
    const out: Row = {};
    for (const [k, v] of Object.entries(value)) out[k] = cloneValue(v);
    return out;
  }
  return value;
}

function toRow(record: object): Row {
  const out: Row = {};
  for (const [k, v] of Object.entries(record)) out[k] = cloneValue(v);
  return out;
}

function hydrate<E extends ObjectLiteral>(entity: EntityClass<E>, row: Row): E {
  return Object.assign(new entity(), toRow(row));
}

function sameValue(actual: unknown, expected: unknown): boolean {
  if (actual instanceof Date && expected instanceof Date) {
    return actual.getTime() === expected.getTime();
  }
  return (actual ?? null) === (expected ?? null);
}

function matches(row: Row, where: object | undefined): boolean {
  if (!where) return true;
  return Object.entries(where).every(
    ([key, expected]) => expected === undefined || sameValue(row[key], expected),
  );
}

function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a).localeCompare(String(b));
}

/**
 * In-process stand-in for the PostgreSQL-backed store.
 *
 * Transactions are serialized through a single queue, which is at least as
 * strict as the row locks the real store takes. Writes inside a transaction
 * are staged and only become visible on commit. Unique constraints, the
 * partial WINNING-bid index included, are read from the entity decorators
 * and checked on every write, surfacing the same ConflictError the driver
 * mapping produces.
 */
export class InMemoryAuctionStore implements AuctionStore {
  readonly manager: StoreManager;
  readonly committed: Tables = new Map();
  readonly insertionOrder = new Map<string, number>();

  transactionCount = 0;
  rollbackCount = 0;

  private sequence = 0;
  private queue: Promise<void> = Promise.resolve();
  private pendingFailures: unknown[] = [];
  private readonly constraintCache = new Map<unknown, UniqueConstraint[]>();

  constructor() {
    this.manager = new InMemoryStoreManager(this, null);
  }

  async transaction<T>(work: (manager: StoreManager) => Promise<T>): Promise<T> {
    const release = await this.acquire();
    this.transactionCount += 1;
    const staged: Tables = new Map();
    try {
      const result = await work(new InMemoryStoreManager(this, staged));
      const failure = this.pendingFailures.shift();
      if (failure !== undefined) {
        throw failure;
      }
      this.commit(staged);
      return result;
    } catch (err) {
      this.rollbackCount += 1;
      throw err;
    } finally {
      release();
    }
  }

  /** Makes the next commit fail with `err`, as a serialization failure would. */
  failNextCommit(err: unknown): void {
    this.pendingFailures.push(err);
  }

  /** Committed rows of one entity, in insertion order. */
  all<E extends ObjectLiteral>(entity: EntityClass<E>): E[] {
    return [...(this.committed.get(entity)?.values() ?? [])].map((row) => hydrate(entity, row));
  }

  nextSequence(id: string): void {
    if (!this.insertionOrder.has(id)) {
      this.sequence += 1;
      this.insertionOrder.set(id, this.sequence);
    }
  }

  constraintsFor(entity: unknown): UniqueConstraint[] {
    const cached = this.constraintCache.get(entity);
    if (cached) return cached;

    const storage = getMetadataArgsStorage();
    const constraints: UniqueConstraint[] = [];

    for (const column of storage.columns) {
      if (column.target === entity && column.options.unique) {
        constraints.push({ name: `uq_${column.propertyName}`, columns: [column.propertyName] });
      }
    }

    for (const index of storage.indices) {
      if (index.target !== entity || !index.unique || !Array.isArray(index.columns)) continue;
      const partial = index.where?.match(/^(\w+) = '([^']*)'$/);
      constraints.push({
        name: index.name ?? `uq_${index.columns.join('_')}`,
        columns: index.columns,
        when: partial ? { column: partial[1], value: partial[2] } : undefined,
      });
    }

    this.constraintCache.set(entity, constraints);
    return constraints;
  }

  applyDefaults(entity: unknown, row: Row): void {
    const now = new Date();
    if (row.id === undefined) row.id = randomUUID();

    for (const column of getMetadataArgsStorage().columns) {
      if (column.target !== entity) continue;
      const key = column.propertyName;
      if (column.mode === 'createDate') {
        row[key] = row[key] ?? now;
      } else if (column.mode === 'updateDate') {
        row[key] = now;
      } else if (row[key] === undefined) {
        const fallback = column.options.default;
        if (fallback !== undefined && typeof fallback !== 'function') {
          row[key] = cloneValue(fallback);
        } else if (column.options.nullable) {
          row[key] = null;
        }
      }
    }
  }

  private commit(staged: Tables): void {
    for (const [entity, rows] of staged) {
      let table = this.committed.get(entity);
      if (!table) {
        table = new Map();
        this.committed.set(entity, table);
      }
      for (const [id, row] of rows) table.set(id, row);
    }
  }

  private async acquire(): Promise<() => void> {
    const previous = this.queue;
    let release: () => void = () => undefined;
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    return release;
  }
}

class InMemoryStoreManager implements StoreManager {
  constructor(
    private readonly store: InMemoryAuctionStore,
    private readonly staged: Tables | null,
  ) {}

  async findOne<E extends ObjectLiteral>(
    entity: EntityClass<E>,
    where: Where<E>,
    _lock?: LockMode,
  ): Promise<E | null> {
    const [first] = this.select(entity, { where, take: 1 });
    return first ? hydrate(entity, first) : null;
  }

  async find<E extends ObjectLiteral>(entity: EntityClass<E>, options: FindOptions<E> = {}): Promise<E[]> {
    return this.select(entity, options).map((row) => hydrate(entity, row));
  }

  async findAndCount<E extends ObjectLiteral>(
    entity: EntityClass<E>,
    options: FindOptions<E> = {},
  ): Promise<[E[], number]> {
    const total = this.select(entity, { ...options, skip: undefined, take: undefined }).length;
    return [await this.find(entity, options), total];
  }

  async count<E extends ObjectLiteral>(entity: EntityClass<E>, where?: Where<E>): Promise<number> {
    return this.select(entity, { where }).length;
  }

  async maximum<E extends ObjectLiteral>(
    entity: EntityClass<E>,
    column: ColumnOf<E>,
    where?: Where<E>,
  ): Promise<number | null> {
    const values = this.select(entity, { where }).map((row) => Number(row[column]));
    return values.length > 0 ? Math.max(...values) : null;
  }

  async insert<E extends ObjectLiteral>(entity: EntityClass<E>, values: Partial<E>): Promise<E> {
    const row = toRow(values);
    if (row.id !== undefined && this.view(entity).has(String(row.id))) {
      throw translateDriverError(
        Object.assign(new Error('duplicate key value'), { code: '23505', constraint: 'pk' }),
      );
    }
    return hydrate(entity, this.write(entity, row));
  }

  async save<E extends ObjectLiteral>(record: E): Promise<E> {
    const entity: unknown = Object.getPrototypeOf(record)?.constructor;
    if (!getMetadataArgsStorage().tables.some((table) => table.target === entity)) {
      throw new Error('save() needs an entity instance');
    }
    // Like TypeORM, the passed instance receives generated values.
    return Object.assign(record, toRow(this.write(entity, toRow(record))));
  }

  private write(entity: unknown, row: Row): Row {
    this.store.applyDefaults(entity, row);
    const id = String(row.id);
    this.checkUnique(entity, row, id);
    this.store.nextSequence(id);

    const target = this.staged ?? this.store.committed;
    let table = target.get(entity);
    if (!table) {
      table = new Map();
      target.set(entity, table);
    }
    table.set(id, row);
    return row;
  }

  private checkUnique(entity: unknown, row: Row, id: string): void {
    for (const constraint of this.store.constraintsFor(entity)) {
      if (constraint.when && row[constraint.when.column] !== constraint.when.value) continue;
      const key = constraint.columns.map((c) => row[c]);
      if (key.some((v) => v === null || v === undefined)) continue;

      for (const [otherId, other] of this.view(entity)) {
        if (otherId === id) continue;
        if (constraint.when && other[constraint.when.column] !== constraint.when.value) continue;
        if (constraint.columns.every((c, i) => sameValue(other[c], key[i]))) {
          throw translateDriverError(
            Object.assign(new Error('duplicate key value violates unique constraint'), {
              code: '23505',
              constraint: constraint.name,
            }),
          );
        }
      }
    }
  }

  private view(entity: unknown): Map<string, Row> {
    const merged = new Map(this.store.committed.get(entity) ?? []);
    for (const [id, row] of this.staged?.get(entity) ?? []) merged.set(id, row);
    return merged;
  }

  private select<E extends ObjectLiteral>(entity: EntityClass<E>, options: FindOptions<E>): Row[] {
    const search = options.search;
    const term = search?.term.trim().toLowerCase() ?? '';
    const range = options.range;

    let rows = [...this.view(entity).values()].filter((row) => {
      if (!matches(row, options.where)) return false;
      if (search && term.length > 0) {
        const hit = search.columns.some((c) => String(row[c] ?? '').toLowerCase().includes(term));
        if (!hit) return false;
      }
      if (range) {
        const raw = row[range.column];
        if (raw === null || raw === undefined) return false;
        const value = new Decimal(String(raw));
        if (range.min !== undefined && value.lessThan(range.min)) return false;
        if (range.max !== undefined && value.greaterThan(range.max)) return false;
      }
      return true;
    });

    const order = Object.entries(options.order ?? { createdAt: 'DESC' });
    const firstDirection = order[0]?.[1] === 'ASC' ? 1 : -1;
    rows.sort((a, b) => {
      for (const [column, direction] of order) {
        const cmp = compareValues(a[column], b[column]);
        if (cmp !== 0) return direction === 'ASC' ? cmp : -cmp;
      }
      const seqA = this.store.insertionOrder.get(String(a.id)) ?? 0;
      const seqB = this.store.insertionOrder.get(String(b.id)) ?? 0;
      return (seqA - seqB) * firstDirection;
    });

    const skip = options.skip ?? 0;
    rows = rows.slice(skip, options.take !== undefined ? skip + options.take : undefined);
    return rows;
  }
}
