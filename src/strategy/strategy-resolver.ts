import type { StrategyCommand } from '@shared/contracts/recommendations';

/**
 * Turns a commander into a strategy label and search keywords. Implementations
 * make a single bounded attempt and resolve to null on any failure.
 */
export abstract class StrategyResolver {
  abstract resolveStrategy(commanderName: string, colorIdentity: string): Promise<StrategyCommand | null>;
}
