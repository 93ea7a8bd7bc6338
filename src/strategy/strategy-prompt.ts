import { COLORLESS_IDENTITY } from '@shared/types/mtg-card';
import { SELECT_CARDS_FUNCTION } from './strategy-command.parser';

export function describeColorIdentity(colorIdentity: string): string {
  return !colorIdentity || colorIdentity === COLORLESS_IDENTITY ? 'C (Colorless)' : colorIdentity;
}

export function buildStrategySystemPrompt(): string {
  return [
    'You are an expert Magic: The Gathering Commander deck builder.',
    'Determine the core synergistic strategy for the given commander and a concise list of 3-5 search keywords.',
    'Respond ONLY with a single, valid JSON object.',
    'Do NOT include any commentary, prose, or markdown fences.',
    'The required output format is:',
    `{"function": "${SELECT_CARDS_FUNCTION}", "strategy": "<CONCISE_STRATEGY>", "keywords": ["KW1", "KW2", "KW3"]}`,
  ].join('\n');
}

export function buildStrategyUserPrompt(commanderName: string, colorIdentity: string): string {
  return [
    `COMMANDER: ${commanderName} (Color Identity: ${describeColorIdentity(colorIdentity)}).`,
    'What is the single best, most synergistic deck strategy for this card?',
    "Give the strategy concisely (e.g. 'Voltron', 'Lifegain', 'Artifact Ramp') and the 3-5 most",
    "critical keywords to search for in a card's name or rules text (e.g. ['Goblin', 'Token', 'Haste']).",
  ].join(' ');
}
