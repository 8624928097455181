import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { StockModule } from '../stock/stock.module';
import { BundlesController } from './bundles.controller';
import {
  BUNDLE_REPOSITORY,
  DrizzleBundleRepository,
} from './bundles.repository';
import { BundlesService } from './bundles.service';

@Module({
  imports: [CatalogModule, StockModule],
  controllers: [BundlesController],
  providers: [
    BundlesService,
    { provide: BUNDLE_REPOSITORY, useClass: DrizzleBundleRepository },
  ],
  exports: [BundlesService],
})
export class BundlesModule {}
