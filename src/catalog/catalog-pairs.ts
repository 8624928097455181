import { BadRequestException, NotFoundException } from '@nestjs/common';
import { CatalogReader } from './catalog.repository';

/** Both ends of a product-warehouse pair, checked to share a company. */
export async function resolveProductWarehouse(
  catalog: CatalogReader,
  productId: number,
  warehouseId: number,
) {
  const [product, warehouse] = await Promise.all([
    catalog.findProduct(productId),
    catalog.findWarehouse(warehouseId),
  ]);
  if (!product) {
    throw new NotFoundException(`Product ${productId} not found.`);
  }
  if (!warehouse) {
    throw new NotFoundException(`Warehouse ${warehouseId} not found.`);
  }
  if (product.companyId !== warehouse.companyId) {
    throw new BadRequestException(
      `Product ${productId} and warehouse ${warehouseId} belong to different companies.`,
    );
  }
  return { product, warehouse };
}

export async function resolveActiveCompany(
  catalog: CatalogReader,
  companyId: number,
) {
  const company = await catalog.findCompany(companyId);
  if (!company || !company.isActive) {
    throw new NotFoundException(`Company ${companyId} not found.`);
  }
  return company;
}
