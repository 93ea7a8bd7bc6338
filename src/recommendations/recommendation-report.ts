import type { RecommendationResponse } from '@shared/contracts/recommendations';
import { COLORLESS_IDENTITY } from '@shared/types/mtg-card';

const SECTIONS = [
  { key: 'owned', title: 'Owned cards' },
  { key: 'missingAffordable', title: 'Missing cards (affordable)' },
  { key: 'missingPremium', title: 'Missing cards (premium)' },
] as const;

/** Plain-text rendering of a recommendation for terminal output. */
export function formatRecommendationReport({ status, commander, strategy, result }: RecommendationResponse): string {
  const colors = commander.colorIdentity === COLORLESS_IDENTITY ? 'C (Colorless)' : commander.colorIdentity;
  const lines = [`Commander: ${commander.name} | Colors: ${colors}`];

  if (status === 'no-strategy' || !strategy) {
    lines.push('No strategy command was produced; card selection did not run.');
    return lines.join('\n');
  }

  lines.push(`Strategy: ${strategy.label}`);
  lines.push(`Keywords: ${strategy.keywords.join(', ')}`);

  const total = result.owned.length + result.missingAffordable.length + result.missingPremium.length;
  if (total === 0) {
    lines.push('', 'No matching cards found for this strategy.');
    return lines.join('\n');
  }

  for (const { key, title } of SECTIONS) {
    const names = result[key];
    lines.push('', `${title} (${names.length}):`);
    if (!names.length) {
      lines.push('  (none)');
      continue;
    }
    names.forEach((name, index) => lines.push(`  ${index + 1}. ${name}`));
  }

  return lines.join('\n');
}
