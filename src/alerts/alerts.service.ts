import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BundlesService } from '../bundles/bundles.service';
import {
  CATALOG_READER,
  CatalogReader,
} from '../catalog/catalog.repository';
import {
  resolveActiveCompany,
  resolveProductWarehouse,
} from '../catalog/catalog-pairs';
import { ProductWarehousePair } from '../catalog/catalog.types';
import { errorCodeOf } from '../common/error-payload';
import { assertLookbackDays } from '../sales-velocity/sales-day';
import { SalesVelocityService } from '../sales-velocity/sales-velocity.service';
import { ALERT_PUBLISHER, AlertPublisher } from './alert.publisher';
import {
  averageDailyVelocity,
  classifySeverity,
  compareAlerts,
  daysOfStockRemaining,
  evaluateReorder,
  resolveThreshold,
} from './alert-policy';
import {
  AlertFailure,
  AlertRun,
  ReorderAlert,
  SeverityPolicy,
} from './alerts.types';

@Injectable()
export class AlertsService {
  private readonly logger = new Logger(AlertsService.name);

  constructor(
    @Inject(CATALOG_READER)
    private readonly catalog: CatalogReader,
    @Inject(ALERT_PUBLISHER)
    private readonly publisher: AlertPublisher,
    private readonly bundlesService: BundlesService,
    private readonly salesVelocityService: SalesVelocityService,
    private readonly configService: ConfigService,
  ) {}

  /** The pair's reorder alert, or `null` when stock is healthy. */
  async computeAlert(
    productId: number,
    warehouseId: number,
    lookbackDays?: number,
    asOf: Date = new Date(),
  ): Promise<ReorderAlert | null> {
    const window = this.resolveLookback(lookbackDays);
    const { product, warehouse } = await resolveProductWarehouse(
      this.catalog,
      productId,
      warehouseId,
    );

    const category =
      product.categoryId !== null
        ? await this.catalog.findCategory(product.categoryId)
        : null;
    const { threshold, source } = resolveThreshold(
      product,
      category,
      Number(this.configService.get('alerts.defaultThreshold') ?? 10),
    );
    const [effectiveStock, velocity, supplier] = await Promise.all([
      this.bundlesService.effectiveStock(productId, warehouseId),
      this.salesVelocityService.getVelocity(
        productId,
        warehouseId,
        window,
        asOf,
      ),
      this.catalog.findPreferredSupplier(productId),
    ]);

    const dailyVelocity = averageDailyVelocity(velocity.unitsSold, window);
    const remaining = daysOfStockRemaining(effectiveStock, dailyVelocity);
    const leadTimeDays = supplier?.leadTimeDays ?? null;
    const reasons = evaluateReorder({
      effectiveStock,
      threshold,
      daysOfStockRemaining: remaining,
      leadTimeDays,
    });
    if (!reasons.length) {
      return null;
    }

    return {
      productId,
      warehouseId,
      companyId: product.companyId,
      sku: product.sku,
      productName: product.name,
      warehouseName: warehouse.name,
      isBundle: product.isBundle,
      effectiveStock,
      threshold,
      thresholdSource: source,
      lookbackDays: window,
      unitsSold: velocity.unitsSold,
      averageDailyVelocity: dailyVelocity,
      daysOfStockRemaining: remaining,
      leadTimeDays,
      supplier: supplier
        ? {
            id: supplier.supplierId,
            name: supplier.name,
            contactEmail: supplier.contactEmail,
          }
        : null,
      reasons,
      severity: classifySeverity(effectiveStock, remaining, this.severity()),
    };
  }

  /**
   * Evaluates every stocked pair of the company plus each active bundle in
   * each active warehouse. One failing pair is reported and skipped. An
   * unknown or inactive company is a 404 and publishes nothing.
   */
  async runCompanyAlerts(
    companyId: number,
    options: { lookbackDays?: number; asOf?: Date } = {},
  ): Promise<AlertRun> {
    const lookbackDays = this.resolveLookback(options.lookbackDays);
    await resolveActiveCompany(this.catalog, companyId);
    const asOf = options.asOf ?? new Date();
    const pairs = await this.companyPairs(companyId);
    const requireRecentSales =
      this.configService.get<boolean>('alerts.requireRecentSales') === true;

    const alerts: ReorderAlert[] = [];
    const failures: AlertFailure[] = [];
    for (const pair of pairs) {
      try {
        const alert = await this.computeAlert(
          pair.productId,
          pair.warehouseId,
          lookbackDays,
          asOf,
        );
        if (alert && (!requireRecentSales || alert.unitsSold > 0)) {
          alerts.push(alert);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Alert evaluation failed for product ${pair.productId} in warehouse ${pair.warehouseId}: ${message}`,
        );
        failures.push({
          productId: pair.productId,
          warehouseId: pair.warehouseId,
          errorCode: errorCodeOf(error),
          message,
        });
      }
    }

    const run: AlertRun = {
      companyId,
      generatedAt: asOf,
      lookbackDays,
      evaluated: pairs.length,
      alerts: alerts.sort(compareAlerts),
      failures,
    };
    await this.publisher.publish(run);
    return run;
  }

  private async companyPairs(companyId: number) {
    const [stocked, bundles, warehouses] = await Promise.all([
      this.catalog.listStockedPairs(companyId),
      this.catalog.listActiveBundles(companyId),
      this.catalog.listActiveWarehouses(companyId),
    ]);
    const pairs: ProductWarehousePair[] = [...stocked];
    for (const bundle of bundles) {
      for (const warehouse of warehouses) {
        pairs.push({ productId: bundle.id, warehouseId: warehouse.id });
      }
    }
    return pairs;
  }

  private resolveLookback(lookbackDays?: number) {
    return assertLookbackDays(
      lookbackDays ?? Number(this.configService.get('alerts.lookbackDays') ?? 30),
      Number(this.configService.get('alerts.maxLookbackDays') ?? 365),
    );
  }

  private severity(): SeverityPolicy {
    const criticalDays = this.configService.get<number | null>(
      'alerts.criticalDaysRemaining',
    );
    return {
      criticalStockLevel: Number(
        this.configService.get('alerts.criticalStockLevel') ?? 0,
      ),
      criticalDaysRemaining:
        typeof criticalDays === 'number' ? criticalDays : null,
    };
  }
}
