import { Injectable } from '@nestjs/common';
import { and, asc, eq, gte, isNull, lte, sql } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import {
  dailySalesSummaries,
  salesAggregationMarkers,
  stockLedgerEntries,
} from '../database/schema';
import { groupDailyTotals } from './sales-day';
import {
  DailySalesSummary,
  PendingSale,
  SaleContribution,
} from './sales-velocity.types';

export const SALES_VELOCITY_REPOSITORY = 'SALES_VELOCITY_REPOSITORY';

export interface SalesVelocityRepository {
  /** Unmarked `sale` entries in ascending ledger order. */
  findUnprocessedSales(limit: number): Promise<PendingSale[]>;
  /**
   * Marks the entries and adds only the newly marked ones to the daily
   * summary, in one transaction. Returns how many were newly marked.
   */
  commitBatch(items: SaleContribution[]): Promise<number>;
  sumQuantitySold(
    productId: number,
    warehouseId: number,
    from: string,
    to: string,
  ): Promise<number>;
  listDailySummaries(
    productId: number,
    warehouseId: number,
    from: string,
    to: string,
  ): Promise<DailySalesSummary[]>;
}

const summaryWindow = (
  productId: number,
  warehouseId: number,
  from: string,
  to: string,
) =>
  and(
    eq(dailySalesSummaries.productId, productId),
    eq(dailySalesSummaries.warehouseId, warehouseId),
    gte(dailySalesSummaries.saleDate, from),
    lte(dailySalesSummaries.saleDate, to),
  );

@Injectable()
export class DrizzleSalesVelocityRepository implements SalesVelocityRepository {
  constructor(private readonly database: DatabaseService) {}

  async findUnprocessedSales(limit: number) {
    return this.database.db
      .select({
        ledgerEntryId: stockLedgerEntries.id,
        productId: stockLedgerEntries.productId,
        warehouseId: stockLedgerEntries.warehouseId,
        quantityChange: stockLedgerEntries.quantityChange,
        createdAt: stockLedgerEntries.createdAt,
      })
      .from(stockLedgerEntries)
      .leftJoin(
        salesAggregationMarkers,
        eq(salesAggregationMarkers.ledgerEntryId, stockLedgerEntries.id),
      )
      .where(
        and(
          eq(stockLedgerEntries.entryType, 'sale'),
          isNull(salesAggregationMarkers.ledgerEntryId),
        ),
      )
      .orderBy(asc(stockLedgerEntries.id))
      .limit(limit);
  }

  async commitBatch(items: SaleContribution[]) {
    if (!items.length) {
      return 0;
    }
    return this.database.db.transaction(async (tx) => {
      const claimed = await tx
        .insert(salesAggregationMarkers)
        .values(items.map((item) => ({ ledgerEntryId: item.ledgerEntryId })))
        .onConflictDoNothing()
        .returning({ ledgerEntryId: salesAggregationMarkers.ledgerEntryId });
      const claimedIds = new Set(claimed.map((row) => row.ledgerEntryId));
      const totals = groupDailyTotals(
        items.filter((item) => claimedIds.has(item.ledgerEntryId)),
      );
      for (const total of totals) {
        await tx
          .insert(dailySalesSummaries)
          .values(total)
          .onConflictDoUpdate({
            target: [
              dailySalesSummaries.productId,
              dailySalesSummaries.warehouseId,
              dailySalesSummaries.saleDate,
            ],
            set: {
              quantitySold: sql`${dailySalesSummaries.quantitySold} + excluded.quantity_sold`,
            },
          });
      }
      return claimedIds.size;
    });
  }

  async sumQuantitySold(
    productId: number,
    warehouseId: number,
    from: string,
    to: string,
  ) {
    const [row] = await this.database.db
      .select({
        total: sql<string>`coalesce(sum(${dailySalesSummaries.quantitySold}), 0)`,
      })
      .from(dailySalesSummaries)
      .where(summaryWindow(productId, warehouseId, from, to));
    return Number(row?.total ?? 0);
  }

  async listDailySummaries(
    productId: number,
    warehouseId: number,
    from: string,
    to: string,
  ) {
    return this.database.db
      .select()
      .from(dailySalesSummaries)
      .where(summaryWindow(productId, warehouseId, from, to))
      .orderBy(asc(dailySalesSummaries.saleDate));
  }
}
