import type { StrategyCommand } from '@shared/contracts/recommendations';

export const SELECT_CARDS_FUNCTION = 'select_cards';

// First flat `{...}` object in the text; models often wrap it in prose or fences.
const OBJECT_PATTERN = /\{[^{}]*\}/;

/**
 * Extracts a strategy command from free-form model output. Returns null when
 * no object is found, it does not parse, or its fields have the wrong shape.
 */
export function parseStrategyCommand(text: string | null | undefined): StrategyCommand | null {
  if (!text) {
    return null;
  }

  const match = text.match(OBJECT_PATTERN);
  if (!match) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(match[0]);
  } catch {
    return null;
  }

  return toStrategyCommand(parsed);
}

/**
 * Validates an already parsed value. Accepts `strategy` or `label` for the
 * strategy name; `function`, when present, must name the card selection call.
 */
export function toStrategyCommand(value: unknown): StrategyCommand | null {
  if (!isRecord(value)) {
    return null;
  }

  if (value.function !== undefined && value.function !== SELECT_CARDS_FUNCTION) {
    return null;
  }

  const rawLabel = value.strategy ?? value.label;
  if (typeof rawLabel !== 'string' || !rawLabel.trim()) {
    return null;
  }

  const { keywords } = value;
  if (!Array.isArray(keywords) || !keywords.every((keyword) => typeof keyword === 'string')) {
    return null;
  }

  return {
    label: rawLabel.trim(),
    keywords: [...keywords],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
