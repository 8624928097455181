export type ThresholdSource = 'product' | 'category' | 'default';

export type AlertReason = 'below_threshold' | 'stockout_before_lead_time';

export type AlertSeverity = 'warning' | 'critical';

export type ResolvedThreshold = {
  threshold: number;
  source: ThresholdSource;
};

export type SeverityPolicy = {
  criticalStockLevel: number;
  criticalDaysRemaining: number | null;
};

export type ReorderAlert = {
  productId: number;
  warehouseId: number;
  companyId: number;
  sku: string;
  productName: string;
  warehouseName: string;
  isBundle: boolean;
  effectiveStock: number;
  threshold: number;
  thresholdSource: ThresholdSource;
  lookbackDays: number;
  unitsSold: number;
  averageDailyVelocity: number;
  /** `null` when nothing sold in the window. */
  daysOfStockRemaining: number | null;
  leadTimeDays: number | null;
  supplier: {
    id: number;
    name: string;
    contactEmail: string | null;
  } | null;
  reasons: AlertReason[];
  severity: AlertSeverity;
};

export type AlertFailure = {
  productId: number;
  warehouseId: number;
  errorCode: string | null;
  message: string;
};

export type AlertRun = {
  companyId: number;
  generatedAt: Date;
  lookbackDays: number;
  evaluated: number;
  alerts: ReorderAlert[];
  failures: AlertFailure[];
};
