import { AlertPublisher } from '../src/alerts/alert.publisher';
import { AlertRun } from '../src/alerts/alerts.types';
import { DuplicateBundleComponentError } from '../src/bundles/bundles.errors';
import {
  BundleRepository,
  BundleUnitOfWork,
} from '../src/bundles/bundles.repository';
import {
  BundleComponent,
  BundleComponentDetail,
  BundleComponentInput,
} from '../src/bundles/bundles.types';
import { AmbiguousPreferredSupplierError } from '../src/catalog/catalog.errors';
import { CatalogReader } from '../src/catalog/catalog.repository';
import {
  CatalogCategory,
  CatalogCompany,
  CatalogProduct,
  CatalogWarehouse,
  PreferredSupplier,
} from '../src/catalog/catalog.types';
import { groupDailyTotals } from '../src/sales-velocity/sales-day';
import { SalesVelocityRepository } from '../src/sales-velocity/sales-velocity.repository';
import {
  DailySalesSummary,
  SaleContribution,
} from '../src/sales-velocity/sales-velocity.types';
import { ConcurrentModificationError } from '../src/stock/stock.errors';
import {
  StockRepository,
  StockUnitOfWork,
} from '../src/stock/stock.repository';
import {
  LedgerEntry,
  LedgerQuery,
  NewLedgerEntry,
  StockLevel,
} from '../src/stock/stock.types';

type Tables = {
  levels: StockLevel[];
  entries: LedgerEntry[];
  components: BundleComponent[];
  summaries: DailySalesSummary[];
  markers: number[];
};

type SupplierLink = {
  productId: number;
  supplier: PreferredSupplier;
  isPreferred: boolean;
};

/**
 * Process-local stand-in for the Postgres schema. Transactions run one at a
 * time and roll every table back when the work throws.
 */
export class InMemoryDatabase {
  tables: Tables = {
    levels: [],
    entries: [],
    components: [],
    summaries: [],
    markers: [],
  };
  readonly companies = new Map<number, CatalogCompany>();
  readonly products = new Map<number, CatalogProduct>();
  readonly warehouses = new Map<number, CatalogWarehouse>();
  readonly categories = new Map<number, CatalogCategory>();
  readonly supplierLinks: SupplierLink[] = [];
  now: () => Date = () => new Date();

  private sequence = 1;
  private queue: Promise<unknown> = Promise.resolve();

  nextId() {
    const id = this.sequence;
    this.sequence += 1;
    return id;
  }

  transaction<T>(work: () => Promise<T>): Promise<T> {
    const run = async () => {
      const snapshot = structuredClone(this.tables);
      try {
        return await work();
      } catch (error) {
        this.tables = snapshot;
        throw error;
      }
    };
    const result = this.queue.then(run);
    this.queue = result.catch(() => undefined);
    return result;
  }

  addCompany(company: Partial<CatalogCompany> & { id: number }) {
    const row: CatalogCompany = {
      name: `Company ${company.id}`,
      isActive: true,
      ...company,
    };
    this.companies.set(row.id, row);
    return row;
  }

  addProduct(product: Partial<CatalogProduct> & { id: number }) {
    const row: CatalogProduct = {
      companyId: 1,
      categoryId: null,
      sku: `SKU-${product.id}`,
      name: `Product ${product.id}`,
      isBundle: false,
      isActive: true,
      lowStockThreshold: null,
      ...product,
    };
    this.products.set(row.id, row);
    return row;
  }

  addWarehouse(warehouse: Partial<CatalogWarehouse> & { id: number }) {
    const row: CatalogWarehouse = {
      companyId: 1,
      name: `Warehouse ${warehouse.id}`,
      isActive: true,
      ...warehouse,
    };
    this.warehouses.set(row.id, row);
    return row;
  }

  addCategory(category: Partial<CatalogCategory> & { id: number }) {
    const row: CatalogCategory = {
      companyId: 1,
      name: `Category ${category.id}`,
      lowStockThresholdDefault: 10,
      ...category,
    };
    this.categories.set(row.id, row);
    return row;
  }

  linkSupplier(
    productId: number,
    supplier: Partial<PreferredSupplier> & { supplierId: number },
    isPreferred = true,
  ) {
    this.supplierLinks.push({
      productId,
      isPreferred,
      supplier: {
        name: `Supplier ${supplier.supplierId}`,
        contactEmail: null,
        leadTimeDays: null,
        ...supplier,
      },
    });
  }

  /** Writes a level row directly, outside the ledger. For drift fixtures. */
  setLevel(productId: number, warehouseId: number, quantity: number) {
    const level = this.tables.levels.find(
      (row) => row.productId === productId && row.warehouseId === warehouseId,
    );
    if (level) {
      level.quantity = quantity;
    }
  }

  level(productId: number, warehouseId: number) {
    return (
      this.tables.levels.find(
        (row) =>
          row.productId === productId && row.warehouseId === warehouseId,
      ) ?? null
    );
  }
}

class InMemoryStockUnitOfWork implements StockUnitOfWork {
  constructor(private readonly db: InMemoryDatabase) {}

  async lockLevel(productId: number, warehouseId: number) {
    let level = this.db.level(productId, warehouseId);
    if (!level) {
      level = {
        id: this.db.nextId(),
        productId,
        warehouseId,
        quantity: 0,
        reservedQty: 0,
        version: 0,
        updatedAt: this.db.now(),
      };
      this.db.tables.levels.push(level);
    }
    return { ...level };
  }

  async saveLevel(
    level: StockLevel,
    next: { quantity: number; reservedQty: number },
  ) {
    const stored = this.db.tables.levels.find((row) => row.id === level.id);
    if (!stored || stored.version !== level.version) {
      throw new ConcurrentModificationError(
        `Stock level ${level.id} changed since it was read (version ${level.version}).`,
      );
    }
    if (
      next.quantity < 0 ||
      next.reservedQty < 0 ||
      next.reservedQty > next.quantity
    ) {
      throw new Error('violates check constraint "stock_levels_quantity_check"');
    }
    stored.quantity = next.quantity;
    stored.reservedQty = next.reservedQty;
    stored.version += 1;
    stored.updatedAt = this.db.now();
    return { ...stored };
  }

  async appendEntry(entry: NewLedgerEntry) {
    const created: LedgerEntry = {
      ...entry,
      id: this.db.nextId(),
      createdAt: this.db.now(),
    };
    this.db.tables.entries.push(created);
    return { ...created };
  }
}

export class InMemoryStockRepository implements StockRepository {
  private pendingConflicts = 0;

  constructor(private readonly db: InMemoryDatabase) {}

  /** The next `count` transactions fail as if another writer won the row. */
  injectConflicts(count: number) {
    this.pendingConflicts = count;
  }

  inTransaction<T>(work: (uow: StockUnitOfWork) => Promise<T>) {
    return this.db.transaction(async () => {
      if (this.pendingConflicts > 0) {
        this.pendingConflicts -= 1;
        throw new ConcurrentModificationError(
          'Stock level is locked by a concurrent transaction.',
        );
      }
      return work(new InMemoryStockUnitOfWork(this.db));
    });
  }

  async findLevel(productId: number, warehouseId: number) {
    const level = this.db.level(productId, warehouseId);
    return level ? { ...level } : null;
  }

  async findLevels(productIds: number[], warehouseId: number) {
    return this.db.tables.levels
      .filter(
        (level) =>
          level.warehouseId === warehouseId &&
          productIds.includes(level.productId),
      )
      .map((level) => ({ ...level }));
  }

  async listEntries(query: LedgerQuery) {
    return this.db.tables.entries
      .filter(
        (entry) =>
          (query.productId === undefined ||
            entry.productId === query.productId) &&
          (query.warehouseId === undefined ||
            entry.warehouseId === query.warehouseId) &&
          (!query.type || entry.entryType === query.type) &&
          (!query.from || entry.createdAt >= query.from) &&
          (!query.to || entry.createdAt <= query.to) &&
          (query.beforeId === undefined || entry.id < query.beforeId),
      )
      .sort((a, b) => b.id - a.id)
      .slice(0, query.take);
  }

  async listPairEntries(productId: number, warehouseId: number) {
    return this.db.tables.entries
      .filter(
        (entry) =>
          entry.productId === productId && entry.warehouseId === warehouseId,
      )
      .sort((a, b) => a.id - b.id);
  }
}

class InMemoryBundleUnitOfWork implements BundleUnitOfWork {
  readonly lockedCompanies: number[] = [];

  constructor(private readonly db: InMemoryDatabase) {}

  async lockCompanyGraph(companyId: number) {
    this.lockedCompanies.push(companyId);
  }

  async listComponentIds(bundleId: number) {
    return this.db.tables.components
      .filter((row) => row.bundleId === bundleId)
      .map((row) => row.componentId);
  }

  async insertComponent(input: BundleComponentInput) {
    const exists = this.db.tables.components.some(
      (row) =>
        row.bundleId === input.bundleId &&
        row.componentId === input.componentId,
    );
    if (exists) {
      throw new DuplicateBundleComponentError(
        input.bundleId,
        input.componentId,
      );
    }
    const created: BundleComponent = {
      ...input,
      id: this.db.nextId(),
      createdAt: this.db.now(),
    };
    this.db.tables.components.push(created);
    return { ...created };
  }
}

export class InMemoryBundleRepository implements BundleRepository {
  constructor(private readonly db: InMemoryDatabase) {}

  inTransaction<T>(work: (uow: BundleUnitOfWork) => Promise<T>) {
    return this.db.transaction(() => work(new InMemoryBundleUnitOfWork(this.db)));
  }

  async listComponents(bundleId: number) {
    const details: BundleComponentDetail[] = [];
    for (const row of this.db.tables.components) {
      const component = this.db.products.get(row.componentId);
      if (row.bundleId !== bundleId || !component) {
        continue;
      }
      details.push({
        bundleId: row.bundleId,
        componentId: row.componentId,
        quantity: row.quantity,
        componentSku: component.sku,
        componentName: component.name,
        componentIsBundle: component.isBundle,
      });
    }
    return details;
  }

  async removeComponent(bundleId: number, componentId: number) {
    const before = this.db.tables.components.length;
    this.db.tables.components = this.db.tables.components.filter(
      (row) => !(row.bundleId === bundleId && row.componentId === componentId),
    );
    return this.db.tables.components.length < before;
  }
}

export class InMemorySalesVelocityRepository
  implements SalesVelocityRepository
{
  private pendingFailures = 0;

  constructor(private readonly db: InMemoryDatabase) {}

  /** The next `count` batch commits fail after marking, and roll back. */
  failNextCommits(count: number) {
    this.pendingFailures = count;
  }

  async findUnprocessedSales(limit: number) {
    const marked = new Set(this.db.tables.markers);
    return this.db.tables.entries
      .filter((entry) => entry.entryType === 'sale' && !marked.has(entry.id))
      .sort((a, b) => a.id - b.id)
      .slice(0, limit)
      .map((entry) => ({
        ledgerEntryId: entry.id,
        productId: entry.productId,
        warehouseId: entry.warehouseId,
        quantityChange: entry.quantityChange,
        createdAt: entry.createdAt,
      }));
  }

  commitBatch(items: SaleContribution[]) {
    return this.db.transaction(async () => {
      const marked = new Set(this.db.tables.markers);
      const claimed = items.filter((item) => !marked.has(item.ledgerEntryId));
      this.db.tables.markers.push(...claimed.map((item) => item.ledgerEntryId));
      if (this.pendingFailures > 0) {
        this.pendingFailures -= 1;
        throw new Error('could not serialize access due to concurrent update');
      }
      for (const total of groupDailyTotals(claimed)) {
        const summary = this.db.tables.summaries.find(
          (row) =>
            row.productId === total.productId &&
            row.warehouseId === total.warehouseId &&
            row.saleDate === total.saleDate,
        );
        if (summary) {
          summary.quantitySold += total.quantitySold;
        } else {
          this.db.tables.summaries.push({ ...total, id: this.db.nextId() });
        }
      }
      return claimed.length;
    });
  }

  async sumQuantitySold(
    productId: number,
    warehouseId: number,
    from: string,
    to: string,
  ) {
    return this.window(productId, warehouseId, from, to).reduce(
      (sum, row) => sum + row.quantitySold,
      0,
    );
  }

  async listDailySummaries(
    productId: number,
    warehouseId: number,
    from: string,
    to: string,
  ) {
    return this.window(productId, warehouseId, from, to).sort((a, b) =>
      a.saleDate.localeCompare(b.saleDate),
    );
  }

  /** Seeds a summary row directly. */
  addSummary(
    productId: number,
    warehouseId: number,
    saleDate: string,
    quantitySold: number,
  ) {
    this.db.tables.summaries.push({
      id: this.db.nextId(),
      productId,
      warehouseId,
      saleDate,
      quantitySold,
    });
  }

  private window(
    productId: number,
    warehouseId: number,
    from: string,
    to: string,
  ) {
    return this.db.tables.summaries.filter(
      (row) =>
        row.productId === productId &&
        row.warehouseId === warehouseId &&
        row.saleDate >= from &&
        row.saleDate <= to,
    );
  }
}

export class InMemoryCatalogReader implements CatalogReader {
  constructor(private readonly db: InMemoryDatabase) {}

  async findCompany(companyId: number) {
    return this.db.companies.get(companyId) ?? null;
  }

  async findProduct(productId: number) {
    return this.db.products.get(productId) ?? null;
  }

  async findWarehouse(warehouseId: number) {
    return this.db.warehouses.get(warehouseId) ?? null;
  }

  async findCategory(categoryId: number) {
    return this.db.categories.get(categoryId) ?? null;
  }

  async findPreferredSupplier(productId: number) {
    const preferred = this.db.supplierLinks.filter(
      (link) => link.productId === productId && link.isPreferred,
    );
    if (preferred.length > 1) {
      throw new AmbiguousPreferredSupplierError(
        productId,
        preferred.map((link) => link.supplier.supplierId),
      );
    }
    return preferred[0]?.supplier ?? null;
  }

  async listStockedPairs(companyId: number) {
    return this.db.tables.levels
      .filter((level) => {
        const product = this.db.products.get(level.productId);
        const warehouse = this.db.warehouses.get(level.warehouseId);
        return (
          product?.companyId === companyId &&
          product.isActive &&
          warehouse?.companyId === companyId &&
          warehouse.isActive
        );
      })
      .map((level) => ({
        productId: level.productId,
        warehouseId: level.warehouseId,
      }))
      .sort((a, b) => a.productId - b.productId || a.warehouseId - b.warehouseId);
  }

  async listActiveBundles(companyId: number) {
    return [...this.db.products.values()]
      .filter(
        (product) =>
          product.companyId === companyId && product.isBundle && product.isActive,
      )
      .sort((a, b) => a.id - b.id);
  }

  async listActiveWarehouses(companyId: number) {
    return [...this.db.warehouses.values()]
      .filter(
        (warehouse) => warehouse.companyId === companyId && warehouse.isActive,
      )
      .sort((a, b) => a.id - b.id);
  }
}

export class RecordingAlertPublisher implements AlertPublisher {
  readonly runs: AlertRun[] = [];

  async publish(run: AlertRun) {
    this.runs.push(run);
  }
}

/** Wires every in-memory store over one shared database. */
export function createInMemoryStores() {
  const db = new InMemoryDatabase();
  return {
    db,
    stock: new InMemoryStockRepository(db),
    bundles: new InMemoryBundleRepository(db),
    sales: new InMemorySalesVelocityRepository(db),
    catalog: new InMemoryCatalogReader(db),
    publisher: new RecordingAlertPublisher(),
  };
}
