import { Module } from '@nestjs/common';
import { PremiumCardsService } from './premium-cards.service';
import { SelectionEngineService } from './selection-engine.service';

@Module({
  providers: [SelectionEngineService, PremiumCardsService],
  exports: [SelectionEngineService, PremiumCardsService],
})
export class SelectionModule {}
