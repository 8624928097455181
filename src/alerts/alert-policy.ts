import { CatalogCategory, CatalogProduct } from '../catalog/catalog.types';
import {
  AlertReason,
  AlertSeverity,
  ReorderAlert,
  ResolvedThreshold,
  SeverityPolicy,
} from './alerts.types';

export function resolveThreshold(
  product: Pick<CatalogProduct, 'lowStockThreshold'>,
  category: Pick<CatalogCategory, 'lowStockThresholdDefault'> | null,
  defaultThreshold: number,
): ResolvedThreshold {
  if (product.lowStockThreshold !== null) {
    return { threshold: product.lowStockThreshold, source: 'product' };
  }
  if (category && category.lowStockThresholdDefault !== null) {
    return { threshold: category.lowStockThresholdDefault, source: 'category' };
  }
  return { threshold: defaultThreshold, source: 'default' };
}

export function averageDailyVelocity(unitsSold: number, lookbackDays: number) {
  return lookbackDays > 0 ? unitsSold / lookbackDays : 0;
}

/** Infinite (`null`) when nothing is selling. */
export function daysOfStockRemaining(
  effectiveStock: number,
  velocity: number,
): number | null {
  if (velocity <= 0) {
    return null;
  }
  return effectiveStock / velocity;
}

export function evaluateReorder(input: {
  effectiveStock: number;
  threshold: number;
  daysOfStockRemaining: number | null;
  leadTimeDays: number | null;
}): AlertReason[] {
  const reasons: AlertReason[] = [];
  if (input.effectiveStock <= input.threshold) {
    reasons.push('below_threshold');
  }
  if (
    input.daysOfStockRemaining !== null &&
    input.leadTimeDays !== null &&
    input.daysOfStockRemaining < input.leadTimeDays
  ) {
    reasons.push('stockout_before_lead_time');
  }
  return reasons;
}

export function classifySeverity(
  effectiveStock: number,
  remaining: number | null,
  policy: SeverityPolicy,
): AlertSeverity {
  if (effectiveStock <= policy.criticalStockLevel) {
    return 'critical';
  }
  if (
    policy.criticalDaysRemaining !== null &&
    remaining !== null &&
    remaining < policy.criticalDaysRemaining
  ) {
    return 'critical';
  }
  return 'warning';
}

/** Soonest stockout first; pairs that are not selling go last. */
export function compareAlerts(a: ReorderAlert, b: ReorderAlert) {
  const left = a.daysOfStockRemaining ?? Number.POSITIVE_INFINITY;
  const right = b.daysOfStockRemaining ?? Number.POSITIVE_INFINITY;
  if (left !== right) {
    return left < right ? -1 : 1;
  }
  return a.productId - b.productId || a.warehouseId - b.warehouseId;
}
