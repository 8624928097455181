import { Controller, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { parseOptionalInt } from '../common/params';
import { AlertsService } from './alerts.service';

@Controller()
export class AlertsController {
  constructor(private readonly alertsService: AlertsService) {}

  @Get('alerts/:productId/:warehouseId')
  async computeAlert(
    @Param('productId', ParseIntPipe) productId: number,
    @Param('warehouseId', ParseIntPipe) warehouseId: number,
    @Query('lookbackDays') lookbackDays?: string,
  ) {
    const alert = await this.alertsService.computeAlert(
      productId,
      warehouseId,
      parseOptionalInt(lookbackDays, 'lookbackDays'),
    );
    return { alert };
  }

  @Get('companies/:companyId/alerts/low-stock')
  runCompanyAlerts(
    @Param('companyId', ParseIntPipe) companyId: number,
    @Query('lookbackDays') lookbackDays?: string,
  ) {
    return this.alertsService.runCompanyAlerts(companyId, {
      lookbackDays: parseOptionalInt(lookbackDays, 'lookbackDays'),
    });
  }
}
