import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CATALOG_READER,
  CatalogReader,
} from '../catalog/catalog.repository';
import { resolveProductWarehouse } from '../catalog/catalog-pairs';
import { CatalogProduct } from '../catalog/catalog.types';
import { assertPositiveQuantity } from '../stock/stock.rules';
import { StockService } from '../stock/stock.service';
import { findCyclePath } from './bundle-graph';
import {
  CircularBundleError,
  DuplicateBundleComponentError,
} from './bundles.errors';
import { BUNDLE_REPOSITORY, BundleRepository } from './bundles.repository';
import {
  BundleComponent,
  BundleComponentInput,
  ComponentAvailability,
  EffectiveStockBreakdown,
} from './bundles.types';

@Injectable()
export class BundlesService {
  private readonly logger = new Logger(BundlesService.name);

  constructor(
    @Inject(BUNDLE_REPOSITORY)
    private readonly bundleRepository: BundleRepository,
    @Inject(CATALOG_READER)
    private readonly catalog: CatalogReader,
    private readonly stockService: StockService,
    private readonly configService: ConfigService,
  ) {}

  listComponents(bundleId: number) {
    return this.bundleRepository.listComponents(bundleId);
  }

  async addComponent(input: BundleComponentInput): Promise<BundleComponent> {
    const [created] = await this.addComponents([input]);
    return created;
  }

  /**
   * Inserts all edges or none. Each edge is checked for cycles against the
   * graph including the edges inserted before it in the same call.
   */
  async addComponents(inputs: BundleComponentInput[]) {
    if (!inputs.length) {
      throw new BadRequestException('At least one component is required.');
    }
    for (const input of inputs) {
      assertPositiveQuantity(input.quantity, 'Component quantity');
    }
    const companyId = await this.resolveCompany(inputs);
    const maxDepth = Number(this.configService.get('bundles.maxDepth') ?? 8);

    const created = await this.bundleRepository.inTransaction(async (uow) => {
      await uow.lockCompanyGraph(companyId);
      const rows: BundleComponent[] = [];
      for (const input of inputs) {
        const path = await findCyclePath(
          input.bundleId,
          input.componentId,
          (bundleId) => uow.listComponentIds(bundleId),
          maxDepth,
        );
        if (path) {
          throw new CircularBundleError(input.bundleId, input.componentId, path);
        }
        const existing = await uow.listComponentIds(input.bundleId);
        if (existing.includes(input.componentId)) {
          throw new DuplicateBundleComponentError(
            input.bundleId,
            input.componentId,
          );
        }
        rows.push(await uow.insertComponent(input));
      }
      return rows;
    });
    this.logger.log(
      `Added ${created.length} bundle component(s) for company ${companyId}.`,
    );
    return created;
  }

  async removeComponent(bundleId: number, componentId: number) {
    const removed = await this.bundleRepository.removeComponent(
      bundleId,
      componentId,
    );
    if (!removed) {
      throw new NotFoundException(
        `Product ${componentId} is not a component of bundle ${bundleId}.`,
      );
    }
    return { bundleId, componentId, removed };
  }

  async effectiveStock(productId: number, warehouseId: number) {
    const breakdown = await this.effectiveStockBreakdown(productId, warehouseId);
    return breakdown.effectiveStock;
  }

  async effectiveStockBreakdown(
    productId: number,
    warehouseId: number,
  ): Promise<EffectiveStockBreakdown> {
    const { product } = await resolveProductWarehouse(
      this.catalog,
      productId,
      warehouseId,
    );
    const memo = new Map<number, number>();
    if (!product.isBundle) {
      return {
        productId,
        warehouseId,
        isBundle: false,
        effectiveStock: await this.available(productId, false, warehouseId, memo),
        components: [],
        limitingComponentId: null,
      };
    }
    const components = await this.componentAvailability(
      productId,
      warehouseId,
      memo,
    );
    const limiting = components.reduce<ComponentAvailability | null>(
      (lowest, line) =>
        !lowest || line.buildableUnits < lowest.buildableUnits ? line : lowest,
      null,
    );
    return {
      productId,
      warehouseId,
      isBundle: true,
      effectiveStock: limiting?.buildableUnits ?? 0,
      components,
      limitingComponentId: limiting?.componentId ?? null,
    };
  }

  private async componentAvailability(
    bundleId: number,
    warehouseId: number,
    memo: Map<number, number>,
  ) {
    const components = await this.bundleRepository.listComponents(bundleId);
    const unread = components
      .filter((line) => !line.componentIsBundle && !memo.has(line.componentId))
      .map((line) => line.componentId);
    if (unread.length) {
      const levels = await this.stockService.getLevels(unread, warehouseId);
      for (const [componentId, level] of levels) {
        memo.set(componentId, level.available);
      }
    }
    const lines: ComponentAvailability[] = [];
    for (const component of components) {
      const available = await this.available(
        component.componentId,
        component.componentIsBundle,
        warehouseId,
        memo,
      );
      lines.push({
        componentId: component.componentId,
        sku: component.componentSku,
        name: component.componentName,
        isBundle: component.componentIsBundle,
        quantityPerBundle: component.quantity,
        available,
        buildableUnits: Math.floor(available / component.quantity),
      });
    }
    return lines;
  }

  /** Unreserved stock of a product, or buildable units of a nested bundle. */
  private async available(
    productId: number,
    isBundle: boolean,
    warehouseId: number,
    memo: Map<number, number>,
  ): Promise<number> {
    const cached = memo.get(productId);
    if (cached !== undefined) {
      return cached;
    }
    let available: number;
    if (isBundle) {
      const lines = await this.componentAvailability(
        productId,
        warehouseId,
        memo,
      );
      available = lines.length
        ? Math.min(...lines.map((line) => line.buildableUnits))
        : 0;
    } else {
      const levels = await this.stockService.getLevels([productId], warehouseId);
      available = levels.get(productId)?.available ?? 0;
    }
    memo.set(productId, available);
    return available;
  }

  private async resolveCompany(inputs: BundleComponentInput[]) {
    const ids = [
      ...new Set(inputs.flatMap((input) => [input.bundleId, input.componentId])),
    ];
    const found = await Promise.all(
      ids.map((id) => this.catalog.findProduct(id)),
    );
    const productsById = new Map<number, CatalogProduct>();
    ids.forEach((id, index) => {
      const product = found[index];
      if (!product) {
        throw new NotFoundException(`Product ${id} not found.`);
      }
      productsById.set(id, product);
    });
    const companyIds = new Set(
      [...productsById.values()].map((product) => product.companyId),
    );
    if (companyIds.size > 1) {
      throw new BadRequestException(
        'Bundle components must belong to the bundle company.',
      );
    }
    for (const input of inputs) {
      if (!productsById.get(input.bundleId)?.isBundle) {
        throw new BadRequestException(
          `Product ${input.bundleId} is not a bundle.`,
        );
      }
    }
    const [companyId] = [...companyIds];
    return companyId;
  }
}
