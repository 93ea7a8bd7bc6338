import type { TieBreak } from '@shared/contracts/recommendations';

export type StrategyProvider = 'ollama' | 'openai';

export interface StrategyConfig {
  provider: StrategyProvider;
  endpoint: string;
  modelName: string;
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
  apiKey?: string;
}

export interface AppConfig {
  port: number;
  frontend: {
    origin: string;
  };
  catalog: {
    path: string;
    cachePath: string;
  };
  collection: {
    path: string;
  };
  selection: {
    premiumCardsPath: string;
    tieBreak: TieBreak;
  };
  strategy: StrategyConfig;
}

function toNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const numeric = Number(value);
  return Number.isFinite(numeric) ? numeric : fallback;
}

const DEFAULT_ENDPOINTS: Record<StrategyProvider, string> = {
  ollama: 'http://localhost:11434/api/generate',
  openai: 'https://api.openai.com/v1',
};

const DEFAULT_MODELS: Record<StrategyProvider, string> = {
  ollama: 'mistral',
  openai: 'gpt-4o-mini',
};

export default (): AppConfig => {
  const provider: StrategyProvider = process.env.STRATEGY_PROVIDER === 'openai' ? 'openai' : 'ollama';

  return {
    port: toNumber(process.env.PORT, 3000),
    frontend: {
      origin: process.env.FRONTEND_ORIGIN || 'http://localhost:3001',
    },
    catalog: {
      path: process.env.CATALOG_PATH ?? 'data/AtomicCards.json',
      cachePath: process.env.CATALOG_CACHE_PATH ?? 'data/commander_legal_cards.json',
    },
    collection: {
      path: process.env.COLLECTION_PATH ?? 'data/collection.csv',
    },
    selection: {
      premiumCardsPath: process.env.PREMIUM_CARDS_PATH ?? 'data/meta/premium-cards.json',
      tieBreak: process.env.SELECTION_TIE_BREAK === 'random' ? 'random' : 'name',
    },
    strategy: {
      provider,
      endpoint: process.env.STRATEGY_ENDPOINT || DEFAULT_ENDPOINTS[provider],
      modelName: process.env.STRATEGY_MODEL || DEFAULT_MODELS[provider],
      timeoutMs: toNumber(process.env.STRATEGY_TIMEOUT_MS, 30000),
      temperature: toNumber(process.env.STRATEGY_TEMPERATURE, 0.1),
      maxTokens: toNumber(process.env.STRATEGY_MAX_TOKENS, 1024),
      apiKey: process.env.OPENAI_API_KEY,
    },
  };
};
