import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { validationSchema } from './config/validation';
import { CatalogModule } from './catalog/catalog.module';
import { CollectionModule } from './collection/collection.module';
import { RecommendationsModule } from './recommendations/recommendations.module';
import { SelectionModule } from './selection/selection.module';
import { StrategyModule } from './strategy/strategy.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validationSchema,
    }),
    CatalogModule,
    CollectionModule,
    SelectionModule,
    StrategyModule,
    RecommendationsModule,
  ],
})
export class AppModule {}
