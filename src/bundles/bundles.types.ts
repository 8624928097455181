import { bundleComponents } from '../database/schema';

export type BundleComponent = typeof bundleComponents.$inferSelect;

export type BundleComponentInput = {
  bundleId: number;
  componentId: number;
  quantity: number;
};

/** A component row joined with the component product's catalog fields. */
export type BundleComponentDetail = {
  bundleId: number;
  componentId: number;
  quantity: number;
  componentSku: string;
  componentName: string;
  componentIsBundle: boolean;
};

export type ComponentAvailability = {
  componentId: number;
  sku: string;
  name: string;
  isBundle: boolean;
  quantityPerBundle: number;
  available: number;
  buildableUnits: number;
};

export type EffectiveStockBreakdown = {
  productId: number;
  warehouseId: number;
  isBundle: boolean;
  effectiveStock: number;
  components: ComponentAvailability[];
  limitingComponentId: number | null;
};
