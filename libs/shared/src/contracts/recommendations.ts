import type { MtgCard } from '../types/mtg-card';

export interface StrategyCommand {
  label: string;
  keywords: string[];
}

export interface SelectionResult {
  owned: string[];
  missingAffordable: string[];
  missingPremium: string[];
}

export type TieBreak = 'name' | 'random';

export interface RecommendationRequest {
  commanderName: string;
  useCollection?: boolean;
  tieBreak?: TieBreak;
}

export type RecommendationStatus = 'ok' | 'no-strategy';

export interface RecommendationResponse {
  status: RecommendationStatus;
  commander: MtgCard;
  strategy: StrategyCommand | null;
  result: SelectionResult;
}

export interface CatalogStats {
  totalCards: number;
}
