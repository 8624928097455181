import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  and,
  asc,
  desc,
  eq,
  gte,
  inArray,
  lt,
  lte,
  sql,
  SQL,
} from 'drizzle-orm';
import {
  DatabaseService,
  DatabaseTransaction,
} from '../database/database.service';
import { isLockConflict } from '../database/pg-errors';
import { stockLedgerEntries, stockLevels } from '../database/schema';
import { ConcurrentModificationError } from './stock.errors';
import {
  LedgerEntry,
  LedgerQuery,
  NewLedgerEntry,
  StockLevel,
} from './stock.types';

export const STOCK_REPOSITORY = 'STOCK_REPOSITORY';

/**
 * Writes available inside one stock transaction. Every level handed out by
 * `lockLevel` stays locked until the transaction ends.
 */
export interface StockUnitOfWork {
  /** Locks the pair's level row, creating it with zero quantity if absent. */
  lockLevel(productId: number, warehouseId: number): Promise<StockLevel>;
  /** Fails with `ConcurrentModificationError` if `level.version` is stale. */
  saveLevel(
    level: StockLevel,
    next: { quantity: number; reservedQty: number },
  ): Promise<StockLevel>;
  appendEntry(entry: NewLedgerEntry): Promise<LedgerEntry>;
}

export interface StockRepository {
  inTransaction<T>(work: (uow: StockUnitOfWork) => Promise<T>): Promise<T>;
  findLevel(productId: number, warehouseId: number): Promise<StockLevel | null>;
  /** Existing levels only; pairs without a row are left out. */
  findLevels(productIds: number[], warehouseId: number): Promise<StockLevel[]>;
  listEntries(query: LedgerQuery): Promise<LedgerEntry[]>;
  /** Every entry of the pair in ledger order. Reconciliation only. */
  listPairEntries(productId: number, warehouseId: number): Promise<LedgerEntry[]>;
}

const pairFilter = (productId: number, warehouseId: number) =>
  and(
    eq(stockLevels.productId, productId),
    eq(stockLevels.warehouseId, warehouseId),
  );

class DrizzleStockUnitOfWork implements StockUnitOfWork {
  constructor(private readonly tx: DatabaseTransaction) {}

  async lockLevel(productId: number, warehouseId: number) {
    const existing = await this.selectForUpdate(productId, warehouseId);
    if (existing) {
      return existing;
    }
    // Only a pair's first write reaches the insert, so the id sequence is not
    // spent on every transaction.
    await this.tx
      .insert(stockLevels)
      .values({ productId, warehouseId })
      .onConflictDoNothing({
        target: [stockLevels.productId, stockLevels.warehouseId],
      });
    const level = await this.selectForUpdate(productId, warehouseId);
    if (!level) {
      throw new Error(
        `Stock level for product ${productId} in warehouse ${warehouseId} could not be locked.`,
      );
    }
    return level;
  }

  private async selectForUpdate(productId: number, warehouseId: number) {
    const [level] = await this.tx
      .select()
      .from(stockLevels)
      .where(pairFilter(productId, warehouseId))
      .for('update');
    return level ?? null;
  }

  async saveLevel(
    level: StockLevel,
    next: { quantity: number; reservedQty: number },
  ) {
    const [saved] = await this.tx
      .update(stockLevels)
      .set({
        quantity: next.quantity,
        reservedQty: next.reservedQty,
        version: level.version + 1,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(stockLevels.id, level.id),
          eq(stockLevels.version, level.version),
        ),
      )
      .returning();
    if (!saved) {
      throw new ConcurrentModificationError(
        `Stock level ${level.id} changed since it was read (version ${level.version}).`,
      );
    }
    return saved;
  }

  async appendEntry(entry: NewLedgerEntry) {
    const [created] = await this.tx
      .insert(stockLedgerEntries)
      .values(entry)
      .returning();
    if (!created) {
      throw new Error('Ledger entry insert returned no row.');
    }
    return created;
  }
}

@Injectable()
export class DrizzleStockRepository implements StockRepository {
  constructor(
    private readonly database: DatabaseService,
    private readonly configService: ConfigService,
  ) {}

  async inTransaction<T>(work: (uow: StockUnitOfWork) => Promise<T>) {
    const lockTimeoutMs = Number(
      this.configService.get('stock.lockTimeoutMs') ?? 5000,
    );
    try {
      return await this.database.db.transaction(async (tx) => {
        await tx.execute(
          sql`select set_config('lock_timeout', ${`${lockTimeoutMs}ms`}, true)`,
        );
        return work(new DrizzleStockUnitOfWork(tx));
      });
    } catch (error) {
      if (isLockConflict(error)) {
        throw new ConcurrentModificationError(
          'Stock level is locked by a concurrent transaction.',
        );
      }
      throw error;
    }
  }

  async findLevel(productId: number, warehouseId: number) {
    const [level] = await this.database.db
      .select()
      .from(stockLevels)
      .where(pairFilter(productId, warehouseId))
      .limit(1);
    return level ?? null;
  }

  async findLevels(productIds: number[], warehouseId: number) {
    return this.database.db
      .select()
      .from(stockLevels)
      .where(
        and(
          inArray(stockLevels.productId, productIds),
          eq(stockLevels.warehouseId, warehouseId),
        ),
      );
  }

  async listEntries(query: LedgerQuery) {
    const filters: SQL[] = [];
    if (query.productId !== undefined) {
      filters.push(eq(stockLedgerEntries.productId, query.productId));
    }
    if (query.warehouseId !== undefined) {
      filters.push(eq(stockLedgerEntries.warehouseId, query.warehouseId));
    }
    if (query.type) {
      filters.push(eq(stockLedgerEntries.entryType, query.type));
    }
    if (query.from) {
      filters.push(gte(stockLedgerEntries.createdAt, query.from));
    }
    if (query.to) {
      filters.push(lte(stockLedgerEntries.createdAt, query.to));
    }
    if (query.beforeId !== undefined) {
      filters.push(lt(stockLedgerEntries.id, query.beforeId));
    }
    return this.database.db
      .select()
      .from(stockLedgerEntries)
      .where(filters.length ? and(...filters) : undefined)
      .orderBy(desc(stockLedgerEntries.id))
      .limit(query.take);
  }

  async listPairEntries(productId: number, warehouseId: number) {
    return this.database.db
      .select()
      .from(stockLedgerEntries)
      .where(
        and(
          eq(stockLedgerEntries.productId, productId),
          eq(stockLedgerEntries.warehouseId, warehouseId),
        ),
      )
      .orderBy(asc(stockLedgerEntries.id));
  }
}
