const toInt = (value: string | undefined, fallback: number) => {
  const parsed = value !== undefined ? parseInt(value, 10) : NaN;
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toOptionalInt = (value: string | undefined) => {
  if (value === undefined || value.trim() === '') {
    return null;
  }
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
};

export default () => ({
  port: toInt(process.env.PORT, 3000),
  database: {
    url: process.env.DATABASE_URL,
    poolMax: toInt(process.env.DATABASE_POOL_MAX, 10),
  },
  stock: {
    lockTimeoutMs: toInt(process.env.STOCK_LOCK_TIMEOUT_MS, 5000),
    maxAttempts: toInt(process.env.STOCK_MAX_ATTEMPTS, 3),
  },
  bundles: {
    maxDepth: toInt(process.env.BUNDLE_MAX_DEPTH, 8),
  },
  salesVelocity: {
    workerEnabled: process.env.SALES_VELOCITY_WORKER_ENABLED !== 'false',
    workerIntervalMs: toInt(
      process.env.SALES_VELOCITY_WORKER_INTERVAL_MS,
      60_000,
    ),
    batchSize: toInt(process.env.SALES_VELOCITY_BATCH_SIZE, 500),
    maxAttempts: toInt(process.env.SALES_VELOCITY_MAX_ATTEMPTS, 3),
  },
  alerts: {
    defaultThreshold: toInt(process.env.ALERT_DEFAULT_THRESHOLD, 10),
    lookbackDays: toInt(process.env.ALERT_LOOKBACK_DAYS, 30),
    maxLookbackDays: toInt(process.env.ALERT_MAX_LOOKBACK_DAYS, 365),
    criticalStockLevel: toInt(process.env.ALERT_CRITICAL_STOCK_LEVEL, 0),
    criticalDaysRemaining: toOptionalInt(
      process.env.ALERT_CRITICAL_DAYS_REMAINING,
    ),
    requireRecentSales: process.env.ALERT_REQUIRE_RECENT_SALES === 'true',
  },
});
