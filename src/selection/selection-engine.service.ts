import { Injectable } from '@nestjs/common';
import { SelectionResult, TieBreak } from '@shared/contracts/recommendations';
import { COLORLESS_IDENTITY, MtgCard } from '@shared/types/mtg-card';
import { parseColorIdentity } from '../catalog/mappers/atomic-card.mapper';

/** Catalogue entries that are never deck cards. */
export const EXCLUDED_ENTITY_NAMES: ReadonlySet<string> = new Set([
  'Token',
  'Emblem',
  'Scheme',
  'Plane',
  'Phenomenon',
  'Vanguard',
  'Conspiracy',
  'Dungeon',
]);

export const SELECTION_LIMITS = {
  owned: 10,
  missingAffordable: 10,
  missingPremium: 5,
} as const;

export type ScoredCard = {
  card: MtgCard;
  score: number;
};

export interface SelectionOptions {
  /** Excluded from the results so the commander never recommends itself. */
  commanderName?: string;
  premiumNames?: ReadonlySet<string>;
  /**
   * `name` orders equally ranked cards by name (deterministic). `random`
   * shuffles candidates before the stable sort, so ties differ between calls.
   */
  tieBreak?: TieBreak;
  /** Source for the `random` tie-break, expected in [0, 1). Out-of-range values are clamped. */
  random?: () => number;
}

export function emptySelectionResult(): SelectionResult {
  return { owned: [], missingAffordable: [], missingPremium: [] };
}

@Injectable()
export class SelectionEngineService {
  selectCards(
    catalog: readonly MtgCard[],
    keywords: readonly string[],
    commanderColorIdentity: string,
    ownedSet: ReadonlySet<string>,
    options: SelectionOptions = {},
  ): SelectionResult {
    const normalizedKeywords = this.normalizeKeywords(keywords);
    if (!normalizedKeywords.length) {
      return emptySelectionResult();
    }

    const ranked = this.rankCandidates(catalog, normalizedKeywords, commanderColorIdentity, options);
    return this.categorize(this.uniqueNames(ranked), ownedSet, options.premiumNames ?? new Set());
  }

  /** Lower-cased, trimmed, de-duplicated keywords longer than one character. */
  normalizeKeywords(keywords: readonly string[]): string[] {
    const normalized = new Set<string>();
    for (const keyword of keywords) {
      const token = keyword.trim().toLowerCase();
      if (token.length > 1) {
        normalized.add(token);
      }
    }
    return Array.from(normalized);
  }

  isColorLegal(card: MtgCard, commanderColors: ReadonlySet<string>): boolean {
    if (card.colorIdentity.trim().toUpperCase() === COLORLESS_IDENTITY) {
      return true;
    }
    return parseColorIdentity(card.colorIdentity).every((color) => commanderColors.has(color));
  }

  /**
   * Number of keywords found in the card's name or rules text. Each keyword
   * counts once no matter how often it occurs. Expects normalized keywords.
   */
  scoreCard(card: MtgCard, normalizedKeywords: readonly string[]): number {
    const haystack = `${card.name} ${card.text ?? ''}`.toLowerCase();
    return normalizedKeywords.filter((keyword) => haystack.includes(keyword)).length;
  }

  /**
   * Color-legal, non-excluded cards with a positive score, best first:
   * score descending, then mana value ascending, then the tie-break.
   */
  rankCandidates(
    catalog: readonly MtgCard[],
    normalizedKeywords: readonly string[],
    commanderColorIdentity: string,
    options: SelectionOptions = {},
  ): ScoredCard[] {
    const commanderColors = new Set(parseColorIdentity(commanderColorIdentity));

    const scored: ScoredCard[] = [];
    for (const card of catalog) {
      if (this.isExcludedEntity(card.name, options.commanderName)) {
        continue;
      }
      if (!this.isColorLegal(card, commanderColors)) {
        continue;
      }
      const score = this.scoreCard(card, normalizedKeywords);
      if (score > 0) {
        scored.push({ card, score });
      }
    }

    const tieBreak = options.tieBreak ?? 'name';
    const candidates = tieBreak === 'random' ? this.shuffle(scored, options.random ?? Math.random) : scored;

    return candidates.sort((a, b) => {
      if (a.score !== b.score) {
        return b.score - a.score;
      }
      if (a.card.manaValue !== b.card.manaValue) {
        return a.card.manaValue - b.card.manaValue;
      }
      return tieBreak === 'name' ? compareNames(a.card.name, b.card.name) : 0;
    });
  }

  private isExcludedEntity(name: string, commanderName?: string): boolean {
    return EXCLUDED_ENTITY_NAMES.has(name) || (commanderName !== undefined && name === commanderName);
  }

  private uniqueNames(ranked: ScoredCard[]): string[] {
    const seen = new Set<string>();
    const names: string[] = [];
    for (const { card } of ranked) {
      if (!seen.has(card.name)) {
        seen.add(card.name);
        names.push(card.name);
      }
    }
    return names;
  }

  private categorize(
    names: string[],
    ownedSet: ReadonlySet<string>,
    premiumNames: ReadonlySet<string>,
  ): SelectionResult {
    const result = emptySelectionResult();

    for (const name of names) {
      if (ownedSet.has(name)) {
        if (result.owned.length < SELECTION_LIMITS.owned) {
          result.owned.push(name);
        }
      } else if (premiumNames.has(name)) {
        if (result.missingPremium.length < SELECTION_LIMITS.missingPremium) {
          result.missingPremium.push(name);
        }
      } else if (result.missingAffordable.length < SELECTION_LIMITS.missingAffordable) {
        result.missingAffordable.push(name);
      }
    }

    return result;
  }

  // Fisher-Yates on a copy; the caller's catalog order is left untouched.
  private shuffle<T>(items: T[], random: () => number): T[] {
    const copy = [...items];
    for (let i = copy.length - 1; i > 0; i--) {
      const j = Math.min(i, Math.max(0, Math.floor(random() * (i + 1))));
      [copy[i], copy[j]] = [copy[j], copy[i]];
    }
    return copy;
  }
}

function compareNames(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
