export type ColorSymbol = 'W' | 'U' | 'B' | 'R' | 'G';

export const COLOR_SYMBOLS: readonly ColorSymbol[] = ['W', 'U', 'B', 'R', 'G'];

/** Color identity sentinel for cards with no colored mana symbols. */
export const COLORLESS_IDENTITY = 'C';

export interface MtgAtomicCardFace {
  name?: string;
  colorIdentity?: string[] | null;
  manaValue?: number | null;
  type?: string | null;
  text?: string | null;
  keywords?: string[] | null;
  power?: string | null;
  toughness?: string | null;
  legalities?: Record<string, string | undefined> | null;
}

export interface MtgAtomicCardsFile {
  meta?: Record<string, unknown>;
  data?: Record<string, MtgAtomicCardFace[] | MtgAtomicCardFace>;
}

export interface MtgCard {
  name: string;
  /** Sorted color letters such as `BR`, or `C` for colorless. */
  colorIdentity: string;
  manaValue: number;
  type: string;
  text: string;
  keywords: string[];
  power: string | null;
  toughness: string | null;
  commanderLegality: string | null;
}
