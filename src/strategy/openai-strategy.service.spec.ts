import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { OpenAiStrategyService } from './openai-strategy.service';

const mockCreate = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    chat: { completions: { create: mockCreate } },
  })),
}));

function makeConfig(overrides: Record<string, unknown> = {}): ConfigService {
  return new ConfigService({
    strategy: {
      endpoint: 'https://llm.test/v1',
      modelName: 'gpt-4o-mini',
      timeoutMs: 5000,
      temperature: 0.1,
      maxTokens: 200,
      apiKey: 'test-key',
      ...overrides,
    },
  });
}

describe('OpenAiStrategyService', () => {
  beforeEach(() => {
    mockCreate.mockReset();
    jest.mocked(OpenAI).mockClear();
  });

  it('requires an API key', () => {
    expect(() => new OpenAiStrategyService(makeConfig({ apiKey: undefined }))).toThrow(
      'OPENAI_API_KEY is not configured',
    );
  });

  it('creates a single-attempt client with the configured endpoint and timeout', () => {
    new OpenAiStrategyService(makeConfig());

    expect(OpenAI).toHaveBeenCalledWith({
      apiKey: 'test-key',
      baseURL: 'https://llm.test/v1',
      timeout: 5000,
      maxRetries: 0,
    });
  });

  it('parses the message content into a strategy command', async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: '{"strategy": "Lifegain", "keywords": ["lifelink", "gain life"]}' } }],
    });
    const service = new OpenAiStrategyService(makeConfig());

    await expect(service.resolveStrategy('Lathiel, the Bounteous Dawn', 'GW')).resolves.toEqual({
      label: 'Lifegain',
      keywords: ['lifelink', 'gain life'],
    });
    expect(mockCreate).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'gpt-4o-mini', temperature: 0.1, max_tokens: 200 }),
    );
  });

  it('omits temperature for reasoning models', async () => {
    mockCreate.mockResolvedValue({ choices: [] });
    const service = new OpenAiStrategyService(makeConfig({ modelName: 'gpt-5-mini' }));

    await expect(service.resolveStrategy('Lathiel, the Bounteous Dawn', 'GW')).resolves.toBeNull();
    expect(mockCreate.mock.calls[0][0]).not.toHaveProperty('temperature');
  });

  it('returns null when the request fails', async () => {
    mockCreate.mockRejectedValue(new Error('Request timed out.'));
    const service = new OpenAiStrategyService(makeConfig());

    await expect(service.resolveStrategy('Lathiel, the Bounteous Dawn', 'GW')).resolves.toBeNull();
  });
});
