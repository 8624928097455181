import { DailySalesSummaryRow } from '../database/schema';

export type DailySalesSummary = DailySalesSummaryRow;

/** A `sale` ledger entry not yet folded into the daily summary. */
export type PendingSale = {
  ledgerEntryId: number;
  productId: number;
  warehouseId: number;
  quantityChange: number;
  createdAt: Date;
};

export type SaleContribution = {
  ledgerEntryId: number;
  productId: number;
  warehouseId: number;
  /** `YYYY-MM-DD`, UTC. */
  saleDate: string;
  quantity: number;
};

export type DailySalesTotal = {
  productId: number;
  warehouseId: number;
  saleDate: string;
  quantitySold: number;
};

export type AggregationResult = {
  batches: number;
  scanned: number;
  applied: number;
};

export type SalesVelocity = {
  productId: number;
  warehouseId: number;
  lookbackDays: number;
  from: string;
  to: string;
  unitsSold: number;
  averageDailyVelocity: number;
};
