import {
  COLOR_SYMBOLS,
  COLORLESS_IDENTITY,
  MtgAtomicCardFace,
  MtgAtomicCardsFile,
  MtgCard,
} from '@shared/types/mtg-card';

/**
 * Joins a color identity list into sorted WUBRG letters, e.g. `['R', 'B']` -> `BR`.
 * Empty or missing identities become the colorless sentinel.
 */
export function normalizeColorIdentity(colors: readonly string[] | null | undefined): string {
  if (!colors?.length) {
    return COLORLESS_IDENTITY;
  }

  const letters = colors
    .map((color) => color.trim().toUpperCase())
    .filter((color) => color.length > 0 && color !== COLORLESS_IDENTITY);

  if (!letters.length) {
    return COLORLESS_IDENTITY;
  }

  return Array.from(new Set(letters)).sort().join('');
}

/**
 * Splits a stored identity such as `BR` back into its letters. The colorless
 * sentinel yields an empty list.
 */
export function parseColorIdentity(identity: string): string[] {
  const normalized = identity.trim().toUpperCase();
  if (!normalized || normalized === COLORLESS_IDENTITY) {
    return [];
  }
  return Array.from(normalized).filter((letter) =>
    (COLOR_SYMBOLS as readonly string[]).includes(letter),
  );
}

export function mapAtomicCard(cardName: string, raw: MtgAtomicCardFace): MtgCard | null {
  const name = (cardName || raw.name || '').trim();
  if (!name) {
    return null;
  }

  const manaValue = Number(raw.manaValue ?? 0);

  return {
    name,
    colorIdentity: normalizeColorIdentity(raw.colorIdentity),
    manaValue: Number.isFinite(manaValue) && manaValue > 0 ? manaValue : 0,
    type: raw.type ?? '',
    text: raw.text ?? '',
    keywords: Array.isArray(raw.keywords)
      ? raw.keywords.filter((keyword): keyword is string => typeof keyword === 'string')
      : [],
    power: raw.power ?? null,
    toughness: raw.toughness ?? null,
    commanderLegality: raw.legalities?.commander ?? null,
  };
}

/**
 * Flattens an MTGJSON AtomicCards payload into one card per name, keeping only
 * Commander-legal entries. When no entry carries legality data the filter is skipped.
 */
export function mapAtomicCardsFile(payload: MtgAtomicCardsFile): MtgCard[] {
  const cards: MtgCard[] = [];

  for (const [cardName, details] of Object.entries(payload.data ?? {})) {
    const face = Array.isArray(details) ? details[0] : details;
    if (!face || typeof face !== 'object') {
      continue;
    }

    const card = mapAtomicCard(cardName, face);
    if (card) {
      cards.push(card);
    }
  }

  const hasLegalities = cards.some((card) => card.commanderLegality !== null);
  if (!hasLegalities) {
    return cards;
  }

  return cards.filter((card) => card.commanderLegality === 'Legal');
}

/**
 * Re-hydrates a row of the normalized catalog cache. Rows without a name are
 * dropped; absent text and keywords read as empty.
 */
export function mapCachedCard(raw: unknown): MtgCard | null {
  if (!raw || typeof raw !== 'object') {
    return null;
  }

  const row = raw as Partial<Record<keyof MtgCard, unknown>>;
  if (typeof row.name !== 'string' || !row.name.trim()) {
    return null;
  }

  const manaValue = Number(row.manaValue ?? 0);

  return {
    name: row.name,
    colorIdentity:
      typeof row.colorIdentity === 'string' && row.colorIdentity
        ? row.colorIdentity
        : COLORLESS_IDENTITY,
    manaValue: Number.isFinite(manaValue) && manaValue > 0 ? manaValue : 0,
    type: typeof row.type === 'string' ? row.type : '',
    text: typeof row.text === 'string' ? row.text : '',
    keywords: Array.isArray(row.keywords)
      ? row.keywords.filter((keyword): keyword is string => typeof keyword === 'string')
      : [],
    power: typeof row.power === 'string' ? row.power : null,
    toughness: typeof row.toughness === 'string' ? row.toughness : null,
    commanderLegality: typeof row.commanderLegality === 'string' ? row.commanderLegality : null,
  };
}
