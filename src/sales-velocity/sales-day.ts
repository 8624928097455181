import { BadRequestException } from '@nestjs/common';
import {
  DailySalesTotal,
  PendingSale,
  SaleContribution,
} from './sales-velocity.types';

const DAY_MS = 24 * 60 * 60 * 1000;

/** UTC calendar date of an instant, as stored in `daily_sales_summary`. */
export function toSaleDate(at: Date) {
  return at.toISOString().slice(0, 10);
}

/** The `lookbackDays` UTC dates ending at `asOf`'s date, inclusive. */
export function lookbackWindow(asOf: Date, lookbackDays: number) {
  return {
    from: toSaleDate(new Date(asOf.getTime() - (lookbackDays - 1) * DAY_MS)),
    to: toSaleDate(asOf),
  };
}

export function assertLookbackDays(value: number, maxLookbackDays: number) {
  if (!Number.isInteger(value) || value < 1 || value > maxLookbackDays) {
    throw new BadRequestException(
      `lookbackDays must be an integer between 1 and ${maxLookbackDays}.`,
    );
  }
  return value;
}

export function toContribution(sale: PendingSale): SaleContribution {
  return {
    ledgerEntryId: sale.ledgerEntryId,
    productId: sale.productId,
    warehouseId: sale.warehouseId,
    saleDate: toSaleDate(sale.createdAt),
    quantity: Math.abs(sale.quantityChange),
  };
}

/** Folds contributions into one total per product, warehouse and day. */
export function groupDailyTotals(items: SaleContribution[]) {
  const totals = new Map<string, DailySalesTotal>();
  for (const item of items) {
    const key = `${item.productId}:${item.warehouseId}:${item.saleDate}`;
    const total = totals.get(key);
    if (total) {
      total.quantitySold += item.quantity;
    } else {
      totals.set(key, {
        productId: item.productId,
        warehouseId: item.warehouseId,
        saleDate: item.saleDate,
        quantitySold: item.quantity,
      });
    }
  }
  return [...totals.values()];
}
