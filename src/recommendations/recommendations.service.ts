import { Injectable, Logger, NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  RecommendationRequest,
  RecommendationResponse,
  TieBreak,
} from '@shared/contracts/recommendations';
import { CardCatalogRepository } from '../catalog/repositories/card-catalog.repository';
import { CollectionRepository } from '../collection/collection.repository';
import { PremiumCardsService } from '../selection/premium-cards.service';
import { emptySelectionResult, SelectionEngineService } from '../selection/selection-engine.service';
import { StrategyResolver } from '../strategy/strategy-resolver';

@Injectable()
export class RecommendationsService {
  private readonly logger = new Logger(RecommendationsService.name);
  private readonly defaultTieBreak: TieBreak;

  constructor(
    private readonly configService: ConfigService,
    private readonly catalogRepository: CardCatalogRepository,
    private readonly collectionRepository: CollectionRepository,
    private readonly premiumCardsService: PremiumCardsService,
    private readonly strategyResolver: StrategyResolver,
    private readonly selectionEngine: SelectionEngineService,
  ) {
    this.defaultTieBreak = this.configService.get<TieBreak>('selection.tieBreak') ?? 'name';
  }

  async recommend({
    commanderName,
    useCollection = true,
    tieBreak,
  }: RecommendationRequest): Promise<RecommendationResponse> {
    const totalCards = await this.catalogRepository.count();
    if (totalCards === 0) {
      throw new ServiceUnavailableException('Card catalog is empty; add AtomicCards.json to the data folder');
    }

    const commander = await this.catalogRepository.findByName(commanderName.trim());
    if (!commander) {
      throw new NotFoundException(`Commander '${commanderName}' not found in the legal card database`);
    }

    this.logger.log(`Commander selected: ${commander.name} | Colors: ${commander.colorIdentity}`);

    const strategy = await this.strategyResolver.resolveStrategy(commander.name, commander.colorIdentity);
    if (!strategy) {
      this.logger.warn(`No strategy command produced for ${commander.name}; skipping card selection`);
      return {
        status: 'no-strategy',
        commander,
        strategy: null,
        result: emptySelectionResult(),
      };
    }

    this.logger.log(`Strategy '${strategy.label}' with keywords [${strategy.keywords.join(', ')}]`);

    const [catalog, ownedSet, premiumNames] = await Promise.all([
      this.catalogRepository.getAllCards(),
      useCollection ? this.collectionRepository.getOwnedNames() : Promise.resolve<ReadonlySet<string>>(new Set()),
      this.premiumCardsService.getPremiumNames(),
    ]);

    const result = this.selectionEngine.selectCards(
      catalog,
      strategy.keywords,
      commander.colorIdentity,
      ownedSet,
      {
        commanderName: commander.name,
        premiumNames,
        tieBreak: tieBreak ?? this.defaultTieBreak,
      },
    );

    this.logger.log(
      `Selected ${result.owned.length} owned, ${result.missingAffordable.length} affordable and ${result.missingPremium.length} premium cards`,
    );

    return {
      status: 'ok',
      commander,
      strategy,
      result,
    };
  }
}
