import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { StrategyCommand } from '@shared/contracts/recommendations';
import { isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { parseStrategyCommand } from './strategy-command.parser';
import { buildStrategySystemPrompt, buildStrategyUserPrompt } from './strategy-prompt';
import { StrategyResolver } from './strategy-resolver';

interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  format: 'json';
  options: {
    temperature: number;
    num_predict: number;
  };
}

interface OllamaGenerateResponse {
  model?: string;
  response?: string;
  done?: boolean;
}

@Injectable()
export class OllamaStrategyService extends StrategyResolver {
  private readonly logger = new Logger(OllamaStrategyService.name);

  private readonly endpoint: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    super();
    this.endpoint = this.configService.get<string>('strategy.endpoint') ?? 'http://localhost:11434/api/generate';
    this.model = this.configService.get<string>('strategy.modelName') ?? 'mistral';
    this.timeoutMs = this.configService.get<number>('strategy.timeoutMs') ?? 30000;
    this.temperature = this.configService.get<number>('strategy.temperature') ?? 0.1;
    this.maxTokens = this.configService.get<number>('strategy.maxTokens') ?? 1024;
  }

  async resolveStrategy(commanderName: string, colorIdentity: string): Promise<StrategyCommand | null> {
    const payload: OllamaGenerateRequest = {
      model: this.model,
      prompt: `${buildStrategySystemPrompt()}\n\nUSER COMMAND: ${buildStrategyUserPrompt(commanderName, colorIdentity)}`,
      stream: false,
      format: 'json',
      options: {
        temperature: this.temperature,
        num_predict: this.maxTokens,
      },
    };

    try {
      const startTime = Date.now();
      const { data } = await firstValueFrom(
        this.httpService.post<OllamaGenerateResponse>(this.endpoint, payload, { timeout: this.timeoutMs }),
      );
      this.logger.log(`Strategy request to ${this.model} completed in ${Date.now() - startTime}ms`);

      const command = parseStrategyCommand(typeof data?.response === 'string' ? data.response : '');
      if (!command) {
        this.logger.warn(`Model ${this.model} returned no usable strategy command for ${commanderName}`);
      }
      return command;
    } catch (error) {
      this.logRequestError(error);
      return null;
    }
  }

  private logRequestError(error: unknown): void {
    if (isAxiosError(error)) {
      if (error.code === 'ECONNREFUSED') {
        this.logger.error(
          `Could not connect to the model server at ${this.endpoint}. Make sure Ollama is running and '${this.model}' is pulled.`,
        );
        return;
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        this.logger.error(`Strategy request timed out after ${this.timeoutMs}ms`);
        return;
      }
      this.logger.error(`Strategy request failed: ${error.message} ${error.response?.status ?? ''}`.trim());
      return;
    }

    this.logger.error(`Unexpected error during strategy generation: ${(error as Error).message}`, error as Error);
  }
}
