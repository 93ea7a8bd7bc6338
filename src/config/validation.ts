import * as Joi from 'joi';

export const validationSchema = Joi.object({
  PORT: Joi.number().default(3000),
  FRONTEND_ORIGIN: Joi.string().default('http://localhost:3001'),
  CATALOG_PATH: Joi.string().default('data/AtomicCards.json'),
  CATALOG_CACHE_PATH: Joi.string().default('data/commander_legal_cards.json'),
  COLLECTION_PATH: Joi.string().default('data/collection.csv'),
  PREMIUM_CARDS_PATH: Joi.string().default('data/meta/premium-cards.json'),
  SELECTION_TIE_BREAK: Joi.string().valid('name', 'random').default('name'),
  STRATEGY_PROVIDER: Joi.string().valid('ollama', 'openai').default('ollama'),
  STRATEGY_ENDPOINT: Joi.string().uri().when('STRATEGY_PROVIDER', {
    is: 'openai',
    then: Joi.optional(),
    otherwise: Joi.string().default('http://localhost:11434/api/generate'),
  }),
  STRATEGY_MODEL: Joi.string(),
  STRATEGY_TIMEOUT_MS: Joi.number().min(1000).default(30000),
  STRATEGY_TEMPERATURE: Joi.number().min(0).max(2).default(0.1),
  STRATEGY_MAX_TOKENS: Joi.number().min(16).default(1024),
  OPENAI_API_KEY: Joi.string().when('STRATEGY_PROVIDER', {
    is: 'openai',
    then: Joi.required(),
    otherwise: Joi.optional(),
  }),
});
