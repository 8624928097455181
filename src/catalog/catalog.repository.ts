import { Injectable } from '@nestjs/common';
import { and, eq } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import {
  companies,
  productCategories,
  products,
  productSuppliers,
  stockLevels,
  suppliers,
  warehouses,
} from '../database/schema';
import { AmbiguousPreferredSupplierError } from './catalog.errors';
import {
  CatalogCategory,
  CatalogCompany,
  CatalogProduct,
  CatalogWarehouse,
  PreferredSupplier,
  ProductWarehousePair,
} from './catalog.types';

export const CATALOG_READER = 'CATALOG_READER';

/**
 * Read-only view of the catalog, warehouse and supplier collaborators.
 */
export interface CatalogReader {
  findCompany(companyId: number): Promise<CatalogCompany | null>;
  findProduct(productId: number): Promise<CatalogProduct | null>;
  findWarehouse(warehouseId: number): Promise<CatalogWarehouse | null>;
  findCategory(categoryId: number): Promise<CatalogCategory | null>;
  /** Throws `AmbiguousPreferredSupplierError` when more than one is flagged. */
  findPreferredSupplier(productId: number): Promise<PreferredSupplier | null>;
  /** Pairs with a stock level row, limited to active products and warehouses. */
  listStockedPairs(companyId: number): Promise<ProductWarehousePair[]>;
  listActiveBundles(companyId: number): Promise<CatalogProduct[]>;
  listActiveWarehouses(companyId: number): Promise<CatalogWarehouse[]>;
}

const productColumns = {
  id: products.id,
  companyId: products.companyId,
  categoryId: products.categoryId,
  sku: products.sku,
  name: products.name,
  isBundle: products.isBundle,
  isActive: products.isActive,
  lowStockThreshold: products.lowStockThreshold,
};

const warehouseColumns = {
  id: warehouses.id,
  companyId: warehouses.companyId,
  name: warehouses.name,
  isActive: warehouses.isActive,
};

@Injectable()
export class DrizzleCatalogReader implements CatalogReader {
  constructor(private readonly database: DatabaseService) {}

  async findCompany(companyId: number) {
    const [row] = await this.database.db
      .select({
        id: companies.id,
        name: companies.name,
        isActive: companies.isActive,
      })
      .from(companies)
      .where(eq(companies.id, companyId))
      .limit(1);
    return row ?? null;
  }

  async findProduct(productId: number) {
    const [row] = await this.database.db
      .select(productColumns)
      .from(products)
      .where(eq(products.id, productId))
      .limit(1);
    return row ?? null;
  }

  async findWarehouse(warehouseId: number) {
    const [row] = await this.database.db
      .select(warehouseColumns)
      .from(warehouses)
      .where(eq(warehouses.id, warehouseId))
      .limit(1);
    return row ?? null;
  }

  async findCategory(categoryId: number) {
    const [row] = await this.database.db
      .select({
        id: productCategories.id,
        companyId: productCategories.companyId,
        name: productCategories.name,
        lowStockThresholdDefault: productCategories.lowStockThresholdDefault,
      })
      .from(productCategories)
      .where(eq(productCategories.id, categoryId))
      .limit(1);
    return row ?? null;
  }

  async findPreferredSupplier(productId: number) {
    const rows = await this.database.db
      .select({
        supplierId: suppliers.id,
        name: suppliers.name,
        contactEmail: suppliers.contactEmail,
        leadTimeDays: suppliers.leadTimeDays,
      })
      .from(productSuppliers)
      .innerJoin(suppliers, eq(productSuppliers.supplierId, suppliers.id))
      .where(
        and(
          eq(productSuppliers.productId, productId),
          eq(productSuppliers.isPreferred, true),
          eq(suppliers.isActive, true),
        ),
      )
      .limit(2);
    if (rows.length > 1) {
      throw new AmbiguousPreferredSupplierError(
        productId,
        rows.map((row) => row.supplierId),
      );
    }
    return rows[0] ?? null;
  }

  async listStockedPairs(companyId: number) {
    return this.database.db
      .select({
        productId: stockLevels.productId,
        warehouseId: stockLevels.warehouseId,
      })
      .from(stockLevels)
      .innerJoin(products, eq(stockLevels.productId, products.id))
      .innerJoin(warehouses, eq(stockLevels.warehouseId, warehouses.id))
      .where(
        and(
          eq(warehouses.companyId, companyId),
          eq(products.companyId, companyId),
          eq(products.isActive, true),
          eq(warehouses.isActive, true),
        ),
      )
      .orderBy(stockLevels.productId, stockLevels.warehouseId);
  }

  async listActiveBundles(companyId: number) {
    return this.database.db
      .select(productColumns)
      .from(products)
      .where(
        and(
          eq(products.companyId, companyId),
          eq(products.isBundle, true),
          eq(products.isActive, true),
        ),
      )
      .orderBy(products.id);
  }

  async listActiveWarehouses(companyId: number) {
    return this.database.db
      .select(warehouseColumns)
      .from(warehouses)
      .where(
        and(eq(warehouses.companyId, companyId), eq(warehouses.isActive, true)),
      )
      .orderBy(warehouses.id);
  }
}
