import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
} from '@nestjs/common';
import { requireId } from '../common/params';
import { BundlesService } from './bundles.service';

type ComponentBody = { componentId: number; quantity: number };

@Controller('bundles')
export class BundlesController {
  constructor(private readonly bundlesService: BundlesService) {}

  @Get(':bundleId/components')
  listComponents(@Param('bundleId', ParseIntPipe) bundleId: number) {
    return this.bundlesService.listComponents(bundleId);
  }

  @Post(':bundleId/components')
  addComponents(
    @Param('bundleId', ParseIntPipe) bundleId: number,
    @Body() body: Partial<ComponentBody> & { components?: ComponentBody[] },
  ) {
    const lines: Partial<ComponentBody>[] = body.components ?? [body];
    if (!Array.isArray(lines)) {
      throw new BadRequestException('components must be an array.');
    }
    return this.bundlesService.addComponents(
      lines.map((line) => ({
        bundleId,
        componentId: requireId(line.componentId, 'componentId'),
        quantity: Number(line.quantity),
      })),
    );
  }

  @Delete(':bundleId/components/:componentId')
  removeComponent(
    @Param('bundleId', ParseIntPipe) bundleId: number,
    @Param('componentId', ParseIntPipe) componentId: number,
  ) {
    return this.bundlesService.removeComponent(bundleId, componentId);
  }

  @Get(':productId/effective-stock/:warehouseId')
  effectiveStock(
    @Param('productId', ParseIntPipe) productId: number,
    @Param('warehouseId', ParseIntPipe) warehouseId: number,
  ) {
    return this.bundlesService.effectiveStockBreakdown(productId, warehouseId);
  }
}
