import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { assertLookbackDays, lookbackWindow, toContribution } from './sales-day';
import {
  SALES_VELOCITY_REPOSITORY,
  SalesVelocityRepository,
} from './sales-velocity.repository';
import {
  AggregationResult,
  SaleContribution,
  SalesVelocity,
} from './sales-velocity.types';

/**
 * Rolls `sale` ledger entries into per-day totals and answers velocity
 * queries from them. An entry is counted once no matter how often the
 * aggregation runs; see `SalesVelocityRepository.commitBatch`.
 */
@Injectable()
export class SalesVelocityService {
  private readonly logger = new Logger(SalesVelocityService.name);

  constructor(
    @Inject(SALES_VELOCITY_REPOSITORY)
    private readonly repository: SalesVelocityRepository,
    private readonly configService: ConfigService,
  ) {}

  async aggregatePendingSales(): Promise<AggregationResult> {
    const batchSize = Math.max(
      1,
      Number(this.configService.get('salesVelocity.batchSize') ?? 500),
    );
    const result: AggregationResult = { batches: 0, scanned: 0, applied: 0 };
    for (;;) {
      const pending = await this.repository.findUnprocessedSales(batchSize);
      if (!pending.length) {
        break;
      }
      const applied = await this.commitWithRetry(pending.map(toContribution));
      result.batches += 1;
      result.scanned += pending.length;
      result.applied += applied;
      if (pending.length < batchSize) {
        break;
      }
    }
    if (result.scanned) {
      this.logger.log(
        `Aggregated ${result.applied} of ${result.scanned} sale entries in ${result.batches} batch(es).`,
      );
    }
    return result;
  }

  async getVelocity(
    productId: number,
    warehouseId: number,
    lookbackDays: number,
    asOf: Date = new Date(),
  ): Promise<SalesVelocity> {
    assertLookbackDays(lookbackDays, this.maxLookbackDays());
    const { from, to } = lookbackWindow(asOf, lookbackDays);
    const unitsSold = await this.repository.sumQuantitySold(
      productId,
      warehouseId,
      from,
      to,
    );
    return {
      productId,
      warehouseId,
      lookbackDays,
      from,
      to,
      unitsSold,
      averageDailyVelocity: unitsSold / lookbackDays,
    };
  }

  listDailySales(
    productId: number,
    warehouseId: number,
    lookbackDays: number,
    asOf: Date = new Date(),
  ) {
    assertLookbackDays(lookbackDays, this.maxLookbackDays());
    const { from, to } = lookbackWindow(asOf, lookbackDays);
    return this.repository.listDailySummaries(productId, warehouseId, from, to);
  }

  private maxLookbackDays() {
    return Number(this.configService.get('alerts.maxLookbackDays') ?? 365);
  }

  private async commitWithRetry(items: SaleContribution[]) {
    const maxAttempts = Math.max(
      1,
      Number(this.configService.get('salesVelocity.maxAttempts') ?? 3),
    );
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.repository.commitBatch(items);
      } catch (error) {
        if (attempt >= maxAttempts) {
          throw error;
        }
        this.logger.warn(
          `Sales batch starting at entry ${items[0]?.ledgerEntryId} failed (attempt ${attempt}/${maxAttempts}): ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }
}
