import { sql } from 'drizzle-orm';
import {
  bigint,
  bigserial,
  boolean,
  check,
  date,
  index,
  integer,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from 'drizzle-orm/pg-core';

const createdAt = () =>
  timestamp('created_at', { withTimezone: true }).defaultNow().notNull();

const updatedAt = () =>
  timestamp('updated_at', { withTimezone: true }).defaultNow().notNull();

const idRef = (name: string) => bigint(name, { mode: 'number' });

export const LEDGER_ENTRY_TYPES = [
  'purchase',
  'sale',
  'adjustment',
  'transfer_in',
  'transfer_out',
] as const;

export const ledgerEntryTypeEnum = pgEnum(
  'stock_ledger_entry_type',
  LEDGER_ENTRY_TYPES,
);

/**
 * Catalog and tenancy tables. They are owned by the catalog collaborator and
 * only read here; they are declared so that foreign keys and cascades hold.
 */
export const companies = pgTable('companies', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  isActive: boolean('is_active').default(true).notNull(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const warehouses = pgTable(
  'warehouses',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    companyId: idRef('company_id')
      .references(() => companies.id, { onDelete: 'cascade' })
      .notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    isActive: boolean('is_active').default(true).notNull(),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    warehousesCompanyNameUnique: uniqueIndex(
      'warehouses_company_name_unique',
    ).on(table.companyId, table.name),
    warehousesCompanyIdx: index('warehouses_company_idx').on(table.companyId),
  }),
);

export const productCategories = pgTable(
  'product_categories',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    companyId: idRef('company_id')
      .references(() => companies.id, { onDelete: 'cascade' })
      .notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    lowStockThresholdDefault: integer('low_stock_threshold_default').default(
      10,
    ),
    createdAt: createdAt(),
  },
  (table) => ({
    productCategoriesCompanyNameUnique: uniqueIndex(
      'product_categories_company_name_unique',
    ).on(table.companyId, table.name),
  }),
);

export const products = pgTable(
  'products',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    companyId: idRef('company_id')
      .references(() => companies.id, { onDelete: 'cascade' })
      .notNull(),
    categoryId: idRef('category_id').references(() => productCategories.id, {
      onDelete: 'set null',
    }),
    sku: varchar('sku', { length: 50 }).notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    isBundle: boolean('is_bundle').default(false).notNull(),
    isActive: boolean('is_active').default(true).notNull(),
    /** Overrides the category default when set. */
    lowStockThreshold: integer('low_stock_threshold'),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    productsCompanySkuUnique: uniqueIndex('products_company_sku_unique').on(
      table.companyId,
      table.sku,
    ),
    productsCategoryIdx: index('products_category_idx').on(table.categoryId),
  }),
);

export const bundleComponents = pgTable(
  'bundle_components',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    bundleId: idRef('bundle_id')
      .references(() => products.id, { onDelete: 'cascade' })
      .notNull(),
    componentId: idRef('component_id')
      .references(() => products.id, { onDelete: 'cascade' })
      .notNull(),
    quantity: integer('quantity').default(1).notNull(),
    createdAt: createdAt(),
  },
  (table) => ({
    bundleComponentsPairUnique: uniqueIndex(
      'bundle_components_pair_unique',
    ).on(table.bundleId, table.componentId),
    bundleComponentsComponentIdx: index('bundle_components_component_idx').on(
      table.componentId,
    ),
    bundleComponentsNotSelfCheck: check(
      'bundle_components_not_self_check',
      sql`${table.bundleId} <> ${table.componentId}`,
    ),
    bundleComponentsQuantityCheck: check(
      'bundle_components_quantity_check',
      sql`${table.quantity} > 0`,
    ),
  }),
);

export const suppliers = pgTable(
  'suppliers',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    companyId: idRef('company_id')
      .references(() => companies.id, { onDelete: 'cascade' })
      .notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    contactEmail: varchar('contact_email', { length: 255 }),
    leadTimeDays: integer('lead_time_days'),
    isActive: boolean('is_active').default(true).notNull(),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    suppliersCompanyNameUnique: uniqueIndex(
      'suppliers_company_name_unique',
    ).on(table.companyId, table.name),
  }),
);

export const productSuppliers = pgTable(
  'product_suppliers',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    productId: idRef('product_id')
      .references(() => products.id, { onDelete: 'cascade' })
      .notNull(),
    supplierId: idRef('supplier_id')
      .references(() => suppliers.id, { onDelete: 'cascade' })
      .notNull(),
    isPreferred: boolean('is_preferred').default(false).notNull(),
    createdAt: createdAt(),
  },
  (table) => ({
    productSuppliersPairUnique: uniqueIndex(
      'product_suppliers_pair_unique',
    ).on(table.productId, table.supplierId),
    productSuppliersPreferredIdx: index('product_suppliers_preferred_idx').on(
      table.productId,
      table.isPreferred,
    ),
  }),
);

/**
 * Denormalized current stock per product-warehouse pair. Written only by the
 * stock repository, inside the same transaction that appends the ledger entry.
 */
export const stockLevels = pgTable(
  'stock_levels',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    productId: idRef('product_id')
      .references(() => products.id, { onDelete: 'cascade' })
      .notNull(),
    warehouseId: idRef('warehouse_id')
      .references(() => warehouses.id, { onDelete: 'cascade' })
      .notNull(),
    quantity: integer('quantity').default(0).notNull(),
    reservedQty: integer('reserved_qty').default(0).notNull(),
    version: integer('version').default(0).notNull(),
    updatedAt: updatedAt(),
  },
  (table) => ({
    stockLevelsPairUnique: uniqueIndex('stock_levels_pair_unique').on(
      table.productId,
      table.warehouseId,
    ),
    stockLevelsWarehouseIdx: index('stock_levels_warehouse_idx').on(
      table.warehouseId,
      table.quantity,
    ),
    stockLevelsQuantityCheck: check(
      'stock_levels_quantity_check',
      sql`${table.quantity} >= 0 AND ${table.reservedQty} >= 0 AND ${table.reservedQty} <= ${table.quantity}`,
    ),
  }),
);

/** Append-only history of every quantity change. */
export const stockLedgerEntries = pgTable(
  'stock_ledger_entries',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    stockLevelId: idRef('stock_level_id')
      .references(() => stockLevels.id, { onDelete: 'cascade' })
      .notNull(),
    productId: idRef('product_id').notNull(),
    warehouseId: idRef('warehouse_id').notNull(),
    entryType: ledgerEntryTypeEnum('entry_type').notNull(),
    quantityChange: integer('quantity_change').notNull(),
    quantityBefore: integer('quantity_before').notNull(),
    quantityAfter: integer('quantity_after').notNull(),
    referenceType: varchar('reference_type', { length: 50 }),
    referenceId: varchar('reference_id', { length: 100 }),
    notes: text('notes'),
    createdBy: idRef('created_by'),
    createdAt: createdAt(),
  },
  (table) => ({
    stockLedgerEntriesPairIdx: index('stock_ledger_entries_pair_idx').on(
      table.productId,
      table.warehouseId,
      table.id,
    ),
    stockLedgerEntriesTypeIdx: index('stock_ledger_entries_type_idx').on(
      table.entryType,
      table.id,
    ),
    stockLedgerEntriesReferenceIdx: index(
      'stock_ledger_entries_reference_idx',
    ).on(table.referenceType, table.referenceId),
    stockLedgerEntriesBalanceCheck: check(
      'stock_ledger_entries_balance_check',
      sql`${table.quantityAfter} = ${table.quantityBefore} + ${table.quantityChange}`,
    ),
  }),
);

export const dailySalesSummaries = pgTable(
  'daily_sales_summary',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    productId: idRef('product_id')
      .references(() => products.id, { onDelete: 'cascade' })
      .notNull(),
    warehouseId: idRef('warehouse_id')
      .references(() => warehouses.id, { onDelete: 'cascade' })
      .notNull(),
    /** UTC calendar date. */
    saleDate: date('sale_date', { mode: 'string' }).notNull(),
    quantitySold: integer('quantity_sold').default(0).notNull(),
  },
  (table) => ({
    dailySalesSummaryKeyUnique: uniqueIndex(
      'daily_sales_summary_key_unique',
    ).on(table.productId, table.warehouseId, table.saleDate),
    dailySalesSummaryQuantityCheck: check(
      'daily_sales_summary_quantity_check',
      sql`${table.quantitySold} >= 0`,
    ),
  }),
);

/** One row per sale ledger entry already folded into the daily summary. */
export const salesAggregationMarkers = pgTable('sales_aggregation_markers', {
  ledgerEntryId: idRef('ledger_entry_id')
    .primaryKey()
    .references(() => stockLedgerEntries.id, { onDelete: 'cascade' }),
  processedAt: timestamp('processed_at', { withTimezone: true })
    .defaultNow()
    .notNull(),
});

export type StockLevelRow = typeof stockLevels.$inferSelect;
export type StockLedgerEntryRow = typeof stockLedgerEntries.$inferSelect;
export type DailySalesSummaryRow = typeof dailySalesSummaries.$inferSelect;
