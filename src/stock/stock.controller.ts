import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { requireId } from '../common/params';
import { StockService } from './stock.service';
import { isLedgerEntryType } from './stock.rules';
import { LedgerReference } from './stock.types';

type ReferenceBody = { type?: string; id?: string | number } | null;

const toReference = (body?: ReferenceBody): LedgerReference | null => {
  if (!body) {
    return null;
  }
  if (!body.type || body.id === undefined || body.id === null) {
    throw new BadRequestException('Reference requires both type and id.');
  }
  return { type: body.type, id: String(body.id) };
};

const toActorId = (value?: number | string | null) =>
  value === undefined || value === null ? null : requireId(value, 'actorId');

@Controller('stock')
export class StockController {
  constructor(private readonly stockService: StockService) {}

  @Post('transactions')
  applyTransaction(
    @Body()
    body: {
      productId: number;
      warehouseId: number;
      type: string;
      quantityChange: number;
      reference?: ReferenceBody;
      actorId?: number | null;
      notes?: string | null;
    },
  ) {
    if (!isLedgerEntryType(body.type)) {
      throw new BadRequestException(`Unknown ledger entry type ${body.type}.`);
    }
    return this.stockService.applyTransaction({
      productId: requireId(body.productId, 'productId'),
      warehouseId: requireId(body.warehouseId, 'warehouseId'),
      type: body.type,
      quantityChange: Number(body.quantityChange),
      reference: toReference(body.reference),
      actorId: toActorId(body.actorId),
      notes: body.notes ?? null,
    });
  }

  @Post('transfers')
  transfer(
    @Body()
    body: {
      productId: number;
      fromWarehouseId: number;
      toWarehouseId: number;
      quantity: number;
      reference?: ReferenceBody;
      actorId?: number | null;
      notes?: string | null;
    },
  ) {
    return this.stockService.transfer({
      productId: requireId(body.productId, 'productId'),
      fromWarehouseId: requireId(body.fromWarehouseId, 'fromWarehouseId'),
      toWarehouseId: requireId(body.toWarehouseId, 'toWarehouseId'),
      quantity: Number(body.quantity),
      reference: toReference(body.reference),
      actorId: toActorId(body.actorId),
      notes: body.notes ?? null,
    });
  }

  @Post('reservations')
  reserve(
    @Body()
    body: {
      productId: number;
      warehouseId: number;
      quantity: number;
      actorId?: number | null;
    },
  ) {
    return this.stockService.reserve({
      productId: requireId(body.productId, 'productId'),
      warehouseId: requireId(body.warehouseId, 'warehouseId'),
      quantity: Number(body.quantity),
      actorId: toActorId(body.actorId),
    });
  }

  @Post('reservations/release')
  release(
    @Body()
    body: {
      productId: number;
      warehouseId: number;
      quantity: number;
      actorId?: number | null;
    },
  ) {
    return this.stockService.release({
      productId: requireId(body.productId, 'productId'),
      warehouseId: requireId(body.warehouseId, 'warehouseId'),
      quantity: Number(body.quantity),
      actorId: toActorId(body.actorId),
    });
  }

  @Get('levels/:productId/:warehouseId')
  getLevel(
    @Param('productId', ParseIntPipe) productId: number,
    @Param('warehouseId', ParseIntPipe) warehouseId: number,
  ) {
    return this.stockService.getLevel(productId, warehouseId);
  }

  @Get('ledger')
  listLedger(
    @Query()
    query: {
      limit?: string;
      cursor?: string;
      productId?: string;
      warehouseId?: string;
      type?: string;
      from?: string;
      to?: string;
    },
  ) {
    return this.stockService.listLedger(query);
  }

  @Get('reconcile/:productId/:warehouseId')
  reconcile(
    @Param('productId', ParseIntPipe) productId: number,
    @Param('warehouseId', ParseIntPipe) warehouseId: number,
  ) {
    return this.stockService.reconcile(productId, warehouseId);
  }
}
