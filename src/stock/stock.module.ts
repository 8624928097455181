import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { StockController } from './stock.controller';
import { DrizzleStockRepository, STOCK_REPOSITORY } from './stock.repository';
import { StockService } from './stock.service';

@Module({
  imports: [CatalogModule],
  controllers: [StockController],
  providers: [
    StockService,
    { provide: STOCK_REPOSITORY, useClass: DrizzleStockRepository },
  ],
  exports: [StockService],
})
export class StockModule {}
