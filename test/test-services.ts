import { ConfigService } from '@nestjs/config';
import { AlertsService } from '../src/alerts/alerts.service';
import { BundlesService } from '../src/bundles/bundles.service';
import configuration from '../src/config/configuration';
import { SalesVelocityService } from '../src/sales-velocity/sales-velocity.service';
import { StockService } from '../src/stock/stock.service';
import { createInMemoryStores } from './in-memory-stores';

type AppConfig = ReturnType<typeof configuration>;

export type ConfigOverrides = {
  stock?: Partial<AppConfig['stock']>;
  bundles?: Partial<AppConfig['bundles']>;
  salesVelocity?: Partial<AppConfig['salesVelocity']>;
  alerts?: Partial<AppConfig['alerts']>;
};

export function createTestConfig(overrides: ConfigOverrides = {}) {
  const defaults = configuration();
  return new ConfigService({
    ...defaults,
    stock: { ...defaults.stock, ...overrides.stock },
    bundles: { ...defaults.bundles, ...overrides.bundles },
    salesVelocity: {
      ...defaults.salesVelocity,
      workerEnabled: false,
      ...overrides.salesVelocity,
    },
    alerts: {
      ...defaults.alerts,
      criticalDaysRemaining: null,
      requireRecentSales: false,
      ...overrides.alerts,
    },
  });
}

/** Every service over one in-memory database, wired the way the modules do. */
export function createTestServices(overrides: ConfigOverrides = {}) {
  const stores = createInMemoryStores();
  const config = createTestConfig(overrides);
  const stockService = new StockService(stores.stock, stores.catalog, config);
  const bundlesService = new BundlesService(
    stores.bundles,
    stores.catalog,
    stockService,
    config,
  );
  const salesVelocityService = new SalesVelocityService(stores.sales, config);
  const alertsService = new AlertsService(
    stores.catalog,
    stores.publisher,
    bundlesService,
    salesVelocityService,
    config,
  );
  return {
    ...stores,
    config,
    stockService,
    bundlesService,
    salesVelocityService,
    alertsService,
  };
}
