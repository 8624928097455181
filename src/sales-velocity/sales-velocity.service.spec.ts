import { BadRequestException } from '@nestjs/common';
import { createTestServices, ConfigOverrides } from '../../test/test-services';

const PRODUCT = 10;
const WAREHOUSE = 1;

const setup = (overrides: ConfigOverrides = {}) => {
  const services = createTestServices(overrides);
  services.db.addWarehouse({ id: WAREHOUSE });
  services.db.addProduct({ id: PRODUCT });
  return services;
};

const at = (services: ReturnType<typeof setup>, iso: string) => {
  services.db.now = () => new Date(iso);
};

const record = (
  services: ReturnType<typeof setup>,
  type: 'purchase' | 'sale' | 'adjustment',
  quantityChange: number,
) =>
  services.stockService.applyTransaction({
    productId: PRODUCT,
    warehouseId: WAREHOUSE,
    type,
    quantityChange,
  });

const summaries = (services: ReturnType<typeof setup>) =>
  services.db.tables.summaries
    .map((row) => [row.saleDate, row.quantitySold])
    .sort();

describe('SalesVelocityService', () => {
  describe('aggregatePendingSales', () => {
    it('folds sales into UTC days and ignores other entry types', async () => {
      const services = setup();
      at(services, '2026-03-09T23:30:00Z');
      await record(services, 'purchase', 100);
      await record(services, 'sale', -4);
      at(services, '2026-03-10T00:15:00Z');
      await record(services, 'sale', -3);
      await record(services, 'sale', -2);
      await record(services, 'adjustment', -1);

      const result = await services.salesVelocityService.aggregatePendingSales();

      expect(result).toEqual({ batches: 1, scanned: 3, applied: 3 });
      expect(summaries(services)).toEqual([
        ['2026-03-09', 4],
        ['2026-03-10', 5],
      ]);
    });

    it('counts each sale once across repeated runs', async () => {
      const services = setup();
      at(services, '2026-03-10T08:00:00Z');
      await record(services, 'purchase', 20);
      await record(services, 'sale', -6);
      await services.salesVelocityService.aggregatePendingSales();

      const rerun = await services.salesVelocityService.aggregatePendingSales();
      await record(services, 'sale', -1);
      await services.salesVelocityService.aggregatePendingSales();

      expect(rerun).toEqual({ batches: 0, scanned: 0, applied: 0 });
      expect(summaries(services)).toEqual([['2026-03-10', 7]]);
    });

    it('works through the backlog in batches', async () => {
      const services = setup({ salesVelocity: { batchSize: 2 } });
      at(services, '2026-03-10T08:00:00Z');
      await record(services, 'purchase', 20);
      for (let i = 0; i < 5; i += 1) {
        await record(services, 'sale', -1);
      }

      const result = await services.salesVelocityService.aggregatePendingSales();

      expect(result).toEqual({ batches: 3, scanned: 5, applied: 5 });
      expect(summaries(services)).toEqual([['2026-03-10', 5]]);
    });

    it('retries a failed batch without double counting', async () => {
      const services = setup();
      at(services, '2026-03-10T08:00:00Z');
      await record(services, 'purchase', 20);
      await record(services, 'sale', -2);
      await record(services, 'sale', -3);
      services.sales.failNextCommits(1);

      const result = await services.salesVelocityService.aggregatePendingSales();

      expect(result.applied).toBe(2);
      expect(summaries(services)).toEqual([['2026-03-10', 5]]);
    });

    it('surfaces a batch that keeps failing and leaves it pending', async () => {
      const services = setup();
      at(services, '2026-03-10T08:00:00Z');
      await record(services, 'purchase', 20);
      await record(services, 'sale', -2);
      services.sales.failNextCommits(3);

      await expect(
        services.salesVelocityService.aggregatePendingSales(),
      ).rejects.toThrow('could not serialize access');
      expect(services.db.tables.markers).toEqual([]);
      expect(services.db.tables.summaries).toEqual([]);
    });
  });

  describe('getVelocity', () => {
    it('averages the window ending at asOf, counting quiet days as zero', async () => {
      const services = setup();
      services.sales.addSummary(PRODUCT, WAREHOUSE, '2026-02-28', 100);
      services.sales.addSummary(PRODUCT, WAREHOUSE, '2026-03-01', 6);
      services.sales.addSummary(PRODUCT, WAREHOUSE, '2026-03-10', 4);
      services.sales.addSummary(PRODUCT, WAREHOUSE, '2026-03-11', 50);

      const velocity = await services.salesVelocityService.getVelocity(
        PRODUCT,
        WAREHOUSE,
        10,
        new Date('2026-03-10T18:00:00Z'),
      );

      expect(velocity).toEqual({
        productId: PRODUCT,
        warehouseId: WAREHOUSE,
        lookbackDays: 10,
        from: '2026-03-01',
        to: '2026-03-10',
        unitsSold: 10,
        averageDailyVelocity: 1,
      });
    });

    it('is zero without sales', async () => {
      const services = setup();

      const velocity = await services.salesVelocityService.getVelocity(
        PRODUCT,
        WAREHOUSE,
        30,
        new Date('2026-03-10T18:00:00Z'),
      );

      expect(velocity.unitsSold).toBe(0);
      expect(velocity.averageDailyVelocity).toBe(0);
    });

    it.each([0, 366, 2.5])('rejects a lookback of %p days', async (days) => {
      const services = setup();

      await expect(
        services.salesVelocityService.getVelocity(PRODUCT, WAREHOUSE, days),
      ).rejects.toBeInstanceOf(BadRequestException);
    });
  });

  it('lists the daily rows of the window in date order', async () => {
    const services = setup();
    services.sales.addSummary(PRODUCT, WAREHOUSE, '2026-03-10', 4);
    services.sales.addSummary(PRODUCT, WAREHOUSE, '2026-03-08', 2);

    const rows = await services.salesVelocityService.listDailySales(
      PRODUCT,
      WAREHOUSE,
      7,
      new Date('2026-03-10T00:00:00Z'),
    );

    expect(rows.map((row) => [row.saleDate, row.quantitySold])).toEqual([
      ['2026-03-08', 2],
      ['2026-03-10', 4],
    ]);
  });
});
