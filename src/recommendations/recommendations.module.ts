import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { CollectionModule } from '../collection/collection.module';
import { SelectionModule } from '../selection/selection.module';
import { StrategyModule } from '../strategy/strategy.module';
import { RecommendationsController } from './recommendations.controller';
import { RecommendationsService } from './recommendations.service';

@Module({
  imports: [CatalogModule, CollectionModule, SelectionModule, StrategyModule],
  controllers: [RecommendationsController],
  providers: [RecommendationsService],
  exports: [RecommendationsService],
})
export class RecommendationsModule {}
