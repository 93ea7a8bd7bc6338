import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { StrategyCommand } from '@shared/contracts/recommendations';
import OpenAI from 'openai';
import { parseStrategyCommand } from './strategy-command.parser';
import { buildStrategySystemPrompt, buildStrategyUserPrompt } from './strategy-prompt';
import { StrategyResolver } from './strategy-resolver';

@Injectable()
export class OpenAiStrategyService extends StrategyResolver {
  private readonly client: OpenAI;
  private readonly logger = new Logger(OpenAiStrategyService.name);

  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    super();
    const apiKey = this.configService.get<string>('strategy.apiKey');
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is not configured');
    }

    this.model = this.configService.get<string>('strategy.modelName') ?? 'gpt-4o-mini';
    this.temperature = this.configService.get<number>('strategy.temperature') ?? 0.1;
    this.maxTokens = this.configService.get<number>('strategy.maxTokens') ?? 1024;
    this.timeoutMs = this.configService.get<number>('strategy.timeoutMs') ?? 30000;

    this.client = new OpenAI({
      apiKey,
      baseURL: this.configService.get<string>('strategy.endpoint'),
      timeout: this.timeoutMs,
      maxRetries: 0,
    });
  }

  async resolveStrategy(commanderName: string, colorIdentity: string): Promise<StrategyCommand | null> {
    try {
      const startTime = Date.now();
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: buildStrategySystemPrompt() },
          { role: 'user', content: buildStrategyUserPrompt(commanderName, colorIdentity) },
        ],
        response_format: { type: 'json_object' },
        max_tokens: this.maxTokens,
        ...(this.shouldSendTemperature() ? { temperature: this.temperature } : {}),
      });
      this.logger.log(`OpenAI strategy request completed in ${Date.now() - startTime}ms`);

      const command = parseStrategyCommand(response.choices[0]?.message?.content ?? '');
      if (!command) {
        this.logger.warn(`Model ${this.model} returned no usable strategy command for ${commanderName}`);
      }
      return command;
    } catch (error) {
      this.logger.error(`OpenAI strategy request failed: ${(error as Error).message}`, error as Error);
      return null;
    }
  }

  private shouldSendTemperature(): boolean {
    // Reasoning models reject a custom temperature.
    const model = this.model.toLowerCase();
    return !(model.startsWith('gpt-5') || model.startsWith('o1') || model.startsWith('o3'));
  }
}
