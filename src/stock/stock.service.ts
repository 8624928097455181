import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CATALOG_READER,
  CatalogReader,
} from '../catalog/catalog.repository';
import { resolveProductWarehouse } from '../catalog/catalog-pairs';
import {
  buildPaginatedResponse,
  parsePagination,
  PaginationQuery,
} from '../common/pagination';
import { parseOptionalDate, parseOptionalId } from '../common/params';
import {
  BundleStockIsDerivedError,
  ConcurrentModificationError,
  InsufficientStockError,
  InvalidQuantityChangeError,
  OverReservationError,
} from './stock.errors';
import {
  STOCK_REPOSITORY,
  StockRepository,
  StockUnitOfWork,
} from './stock.repository';
import {
  assertPositiveQuantity,
  assertQuantityChange,
  isLedgerEntryType,
  MAX_STOCK_QUANTITY,
} from './stock.rules';
import {
  ApplyTransactionInput,
  LedgerChange,
  LedgerEntry,
  LedgerEntryType,
  ReconciliationReport,
  ReservationInput,
  StockLevel,
  StockLevelView,
  TransferInput,
  TransferResult,
} from './stock.types';

const toLevelView = (
  productId: number,
  warehouseId: number,
  level: StockLevel | null,
): StockLevelView => ({
  productId,
  warehouseId,
  quantity: level?.quantity ?? 0,
  reservedQty: level?.reservedQty ?? 0,
  available: level ? level.quantity - level.reservedQty : 0,
  version: level?.version ?? 0,
  updatedAt: level?.updatedAt ?? null,
});

/**
 * Owns every write to stock levels. A quantity change is applied to the
 * level and appended to the ledger in one transaction; reservations only
 * move `reservedQty` and leave the ledger untouched.
 */
@Injectable()
export class StockService {
  private readonly logger = new Logger(StockService.name);

  constructor(
    @Inject(STOCK_REPOSITORY)
    private readonly stockRepository: StockRepository,
    @Inject(CATALOG_READER)
    private readonly catalog: CatalogReader,
    private readonly configService: ConfigService,
  ) {}

  async applyTransaction(input: ApplyTransactionInput): Promise<LedgerEntry> {
    assertQuantityChange(input.type, input.quantityChange);
    await this.resolveStockedPair(input.productId, input.warehouseId);

    const entry = await this.withConflictRetry('applyTransaction', () =>
      this.stockRepository.inTransaction(async (uow) => {
        const level = await uow.lockLevel(input.productId, input.warehouseId);
        return this.applyLocked(uow, level, input);
      }),
    );
    this.logger.debug(
      `Ledger entry ${entry.id}: ${entry.entryType} ${entry.quantityChange} for product ${entry.productId} in warehouse ${entry.warehouseId} (${entry.quantityBefore} -> ${entry.quantityAfter}).`,
    );
    return entry;
  }

  async transfer(input: TransferInput): Promise<TransferResult> {
    assertPositiveQuantity(input.quantity, 'Transfer quantity');
    if (input.fromWarehouseId === input.toWarehouseId) {
      throw new BadRequestException(
        'Source and destination warehouses must differ.',
      );
    }
    await Promise.all([
      this.resolveStockedPair(input.productId, input.fromWarehouseId),
      this.resolveStockedPair(input.productId, input.toWarehouseId),
    ]);

    const shared = {
      reference: input.reference,
      actorId: input.actorId,
      notes: input.notes,
    };
    const result = await this.withConflictRetry('transfer', () =>
      this.stockRepository.inTransaction(async (uow) => {
        // Ascending warehouse order keeps two opposite transfers from deadlocking.
        const sourceFirst = input.fromWarehouseId < input.toWarehouseId;
        const firstLevel = await uow.lockLevel(
          input.productId,
          sourceFirst ? input.fromWarehouseId : input.toWarehouseId,
        );
        const secondLevel = await uow.lockLevel(
          input.productId,
          sourceFirst ? input.toWarehouseId : input.fromWarehouseId,
        );
        const source = sourceFirst ? firstLevel : secondLevel;
        const destination = sourceFirst ? secondLevel : firstLevel;
        const outbound = await this.applyLocked(uow, source, {
          ...shared,
          type: 'transfer_out',
          quantityChange: -input.quantity,
        });
        const inbound = await this.applyLocked(uow, destination, {
          ...shared,
          type: 'transfer_in',
          quantityChange: input.quantity,
        });
        return { outbound, inbound };
      }),
    );
    this.logger.debug(
      `Transferred ${input.quantity} of product ${input.productId} from warehouse ${input.fromWarehouseId} to ${input.toWarehouseId} (entries ${result.outbound.id}, ${result.inbound.id}).`,
    );
    return result;
  }

  async reserve(input: ReservationInput): Promise<StockLevelView> {
    assertPositiveQuantity(input.quantity, 'Reservation quantity');
    await this.resolveStockedPair(input.productId, input.warehouseId);

    const level = await this.withConflictRetry('reserve', () =>
      this.stockRepository.inTransaction(async (uow) => {
        const current = await uow.lockLevel(input.productId, input.warehouseId);
        const reservedQty = current.reservedQty + input.quantity;
        if (reservedQty > current.quantity) {
          throw new OverReservationError(
            `Cannot reserve ${input.quantity}: only ${current.quantity - current.reservedQty} unreserved.`,
            { ...this.pairState(current), requested: input.quantity },
          );
        }
        return uow.saveLevel(current, {
          quantity: current.quantity,
          reservedQty,
        });
      }),
    );
    this.logReservation('Reserved', input, level);
    return toLevelView(input.productId, input.warehouseId, level);
  }

  async release(input: ReservationInput): Promise<StockLevelView> {
    assertPositiveQuantity(input.quantity, 'Release quantity');
    await this.resolveStockedPair(input.productId, input.warehouseId);

    const level = await this.withConflictRetry('release', () =>
      this.stockRepository.inTransaction(async (uow) => {
        const current = await uow.lockLevel(input.productId, input.warehouseId);
        const reservedQty = current.reservedQty - input.quantity;
        if (reservedQty < 0) {
          throw new OverReservationError(
            `Cannot release ${input.quantity}: only ${current.reservedQty} reserved.`,
            { ...this.pairState(current), requested: input.quantity },
          );
        }
        return uow.saveLevel(current, {
          quantity: current.quantity,
          reservedQty,
        });
      }),
    );
    this.logReservation('Released', input, level);
    return toLevelView(input.productId, input.warehouseId, level);
  }

  async getLevel(productId: number, warehouseId: number) {
    await this.resolvePair(productId, warehouseId);
    const level = await this.stockRepository.findLevel(productId, warehouseId);
    return toLevelView(productId, warehouseId, level);
  }

  /** Current levels of several products in one warehouse, zero for unknown pairs. */
  async getLevels(productIds: number[], warehouseId: number) {
    const levels = productIds.length
      ? await this.stockRepository.findLevels(productIds, warehouseId)
      : [];
    const byProduct = new Map(levels.map((level) => [level.productId, level]));
    return new Map(
      productIds.map((productId) => [
        productId,
        toLevelView(productId, warehouseId, byProduct.get(productId) ?? null),
      ]),
    );
  }

  async listLedger(
    query: PaginationQuery & {
      productId?: string;
      warehouseId?: string;
      type?: string;
      from?: string;
      to?: string;
    },
  ) {
    const pagination = parsePagination(query);
    let type: LedgerEntryType | undefined;
    if (query.type) {
      if (!isLedgerEntryType(query.type)) {
        throw new BadRequestException(`Unknown ledger entry type ${query.type}.`);
      }
      type = query.type;
    }
    const items = await this.stockRepository.listEntries({
      productId: parseOptionalId(query.productId, 'productId'),
      warehouseId: parseOptionalId(query.warehouseId, 'warehouseId'),
      type,
      from: parseOptionalDate(query.from, 'from'),
      to: parseOptionalDate(query.to, 'to'),
      beforeId: pagination.cursor,
      take: pagination.take,
    });
    return buildPaginatedResponse(items, pagination.take);
  }

  /**
   * Replays the pair's ledger and compares it with the stored level.
   * Read-only; meant for repair tooling, not for serving reads.
   */
  async reconcile(
    productId: number,
    warehouseId: number,
  ): Promise<ReconciliationReport> {
    await this.resolvePair(productId, warehouseId);
    const [level, entries] = await Promise.all([
      this.stockRepository.findLevel(productId, warehouseId),
      this.stockRepository.listPairEntries(productId, warehouseId),
    ]);

    const chainBreaks = new Set<number>();
    let replayedQuantity = 0;
    let expectedBefore = 0;
    for (const entry of entries) {
      if (
        entry.quantityBefore !== expectedBefore ||
        entry.quantityAfter !== entry.quantityBefore + entry.quantityChange
      ) {
        chainBreaks.add(entry.id);
      }
      replayedQuantity += entry.quantityChange;
      expectedBefore = entry.quantityAfter;
    }

    const levelQuantity = level?.quantity ?? 0;
    const last = entries[entries.length - 1];
    const report: ReconciliationReport = {
      productId,
      warehouseId,
      entryCount: entries.length,
      lastEntryId: last?.id ?? null,
      replayedQuantity,
      levelQuantity,
      chainBreaks: [...chainBreaks],
      consistent:
        chainBreaks.size === 0 &&
        replayedQuantity === levelQuantity &&
        (last ? last.quantityAfter === levelQuantity : true),
    };
    if (!report.consistent) {
      this.logger.warn(
        `Ledger drift for product ${productId} in warehouse ${warehouseId}: ledger ${replayedQuantity}, level ${levelQuantity}, breaks [${report.chainBreaks.join(', ')}].`,
      );
    }
    return report;
  }

  private async applyLocked(
    uow: StockUnitOfWork,
    level: StockLevel,
    change: LedgerChange,
  ) {
    const quantityAfter = level.quantity + change.quantityChange;
    if (quantityAfter < 0 || quantityAfter < level.reservedQty) {
      throw new InsufficientStockError({
        ...this.pairState(level),
        quantityChange: change.quantityChange,
      });
    }
    if (quantityAfter > MAX_STOCK_QUANTITY) {
      throw new InvalidQuantityChangeError(
        `Stock of product ${level.productId} in warehouse ${level.warehouseId} would exceed ${MAX_STOCK_QUANTITY}.`,
      );
    }
    await uow.saveLevel(level, {
      quantity: quantityAfter,
      reservedQty: level.reservedQty,
    });
    return uow.appendEntry({
      stockLevelId: level.id,
      productId: level.productId,
      warehouseId: level.warehouseId,
      entryType: change.type,
      quantityChange: change.quantityChange,
      quantityBefore: level.quantity,
      quantityAfter,
      referenceType: change.reference?.type ?? null,
      referenceId: change.reference?.id ?? null,
      notes: change.notes ?? null,
      createdBy: change.actorId ?? null,
    });
  }

  private async withConflictRetry<T>(
    operation: string,
    run: () => Promise<T>,
  ): Promise<T> {
    const maxAttempts = Math.max(
      1,
      Number(this.configService.get('stock.maxAttempts') ?? 3),
    );
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await run();
      } catch (error) {
        if (
          error instanceof ConcurrentModificationError &&
          attempt < maxAttempts
        ) {
          this.logger.warn(
            `${operation} hit a concurrent modification (attempt ${attempt}/${maxAttempts}); retrying.`,
          );
          continue;
        }
        throw error;
      }
    }
  }

  private resolvePair(productId: number, warehouseId: number) {
    return resolveProductWarehouse(this.catalog, productId, warehouseId);
  }

  private async resolveStockedPair(productId: number, warehouseId: number) {
    const pair = await this.resolvePair(productId, warehouseId);
    if (pair.product.isBundle) {
      throw new BundleStockIsDerivedError(productId);
    }
    return pair;
  }

  private pairState(level: StockLevel) {
    return {
      productId: level.productId,
      warehouseId: level.warehouseId,
      quantity: level.quantity,
      reservedQty: level.reservedQty,
    };
  }

  private logReservation(
    verb: 'Reserved' | 'Released',
    input: ReservationInput,
    level: StockLevel,
  ) {
    this.logger.log(
      `${verb} ${input.quantity} of product ${input.productId} in warehouse ${input.warehouseId}; reserved ${level.reservedQty}/${level.quantity}${input.actorId ? ` by actor ${input.actorId}` : ''}.`,
    );
  }
}
