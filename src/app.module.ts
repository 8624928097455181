import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { AlertsModule } from './alerts/alerts.module';
import { BundlesModule } from './bundles/bundles.module';
import { CatalogModule } from './catalog/catalog.module';
import { DatabaseModule } from './database/database.module';
import { SalesVelocityModule } from './sales-velocity/sales-velocity.module';
import { StockModule } from './stock/stock.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    DatabaseModule,
    CatalogModule,
    StockModule,
    BundlesModule,
    SalesVelocityModule,
    AlertsModule,
  ],
})
export class AppModule {}
