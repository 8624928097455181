export type CatalogCompany = {
  id: number;
  name: string;
  isActive: boolean;
};

export type CatalogProduct = {
  id: number;
  companyId: number;
  categoryId: number | null;
  sku: string;
  name: string;
  isBundle: boolean;
  isActive: boolean;
  lowStockThreshold: number | null;
};

export type CatalogCategory = {
  id: number;
  companyId: number;
  name: string;
  lowStockThresholdDefault: number | null;
};

export type CatalogWarehouse = {
  id: number;
  companyId: number;
  name: string;
  isActive: boolean;
};

export type PreferredSupplier = {
  supplierId: number;
  name: string;
  contactEmail: string | null;
  leadTimeDays: number | null;
};

export type ProductWarehousePair = {
  productId: number;
  warehouseId: number;
};
