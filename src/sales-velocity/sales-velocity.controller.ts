import {
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { parseOptionalDate, parseOptionalInt } from '../common/params';
import { SalesVelocityService } from './sales-velocity.service';

@Controller('sales-velocity')
export class SalesVelocityController {
  constructor(
    private readonly salesVelocityService: SalesVelocityService,
    private readonly configService: ConfigService,
  ) {}

  @Post('aggregate')
  aggregate() {
    return this.salesVelocityService.aggregatePendingSales();
  }

  @Get(':productId/:warehouseId')
  getVelocity(
    @Param('productId', ParseIntPipe) productId: number,
    @Param('warehouseId', ParseIntPipe) warehouseId: number,
    @Query() query: { lookbackDays?: string; asOf?: string },
  ) {
    return this.salesVelocityService.getVelocity(
      productId,
      warehouseId,
      this.lookbackDays(query.lookbackDays),
      parseOptionalDate(query.asOf, 'asOf'),
    );
  }

  @Get(':productId/:warehouseId/daily')
  listDailySales(
    @Param('productId', ParseIntPipe) productId: number,
    @Param('warehouseId', ParseIntPipe) warehouseId: number,
    @Query() query: { lookbackDays?: string; asOf?: string },
  ) {
    return this.salesVelocityService.listDailySales(
      productId,
      warehouseId,
      this.lookbackDays(query.lookbackDays),
      parseOptionalDate(query.asOf, 'asOf'),
    );
  }

  private lookbackDays(value?: string) {
    return (
      parseOptionalInt(value, 'lookbackDays') ??
      Number(this.configService.get('alerts.lookbackDays') ?? 30)
    );
  }
}
