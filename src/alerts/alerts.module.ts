import { Module } from '@nestjs/common';
import { BundlesModule } from '../bundles/bundles.module';
import { CatalogModule } from '../catalog/catalog.module';
import { SalesVelocityModule } from '../sales-velocity/sales-velocity.module';
import { ALERT_PUBLISHER, LoggingAlertPublisher } from './alert.publisher';
import { AlertsController } from './alerts.controller';
import { AlertsService } from './alerts.service';

@Module({
  imports: [CatalogModule, BundlesModule, SalesVelocityModule],
  controllers: [AlertsController],
  providers: [
    AlertsService,
    { provide: ALERT_PUBLISHER, useClass: LoggingAlertPublisher },
  ],
})
export class AlertsModule {}
