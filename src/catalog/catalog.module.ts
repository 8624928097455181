import { Module } from '@nestjs/common';
import { CATALOG_READER, DrizzleCatalogReader } from './catalog.repository';

@Module({
  providers: [{ provide: CATALOG_READER, useClass: DrizzleCatalogReader }],
  exports: [CATALOG_READER],
})
export class CatalogModule {}
