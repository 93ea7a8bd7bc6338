import { Module } from '@nestjs/common';
import { CatalogController } from './catalog.controller';
import { CardCatalogRepository } from './repositories/card-catalog.repository';

@Module({
  controllers: [CatalogController],
  providers: [CardCatalogRepository],
  exports: [CardCatalogRepository],
})
export class CatalogModule {}
