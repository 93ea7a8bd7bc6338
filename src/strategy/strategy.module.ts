import { HttpModule, HttpService } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaStrategyService } from './ollama-strategy.service';
import { OpenAiStrategyService } from './openai-strategy.service';
import { StrategyResolver } from './strategy-resolver';

@Module({
  imports: [
    HttpModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        timeout: configService.get<number>('strategy.timeoutMs'),
        headers: {
          Accept: 'application/json',
        },
      }),
    }),
  ],
  providers: [
    {
      provide: StrategyResolver,
      inject: [ConfigService, HttpService],
      useFactory: (configService: ConfigService, httpService: HttpService): StrategyResolver =>
        configService.get<string>('strategy.provider') === 'openai'
          ? new OpenAiStrategyService(configService)
          : new OllamaStrategyService(httpService, configService),
    },
  ],
  exports: [StrategyResolver],
})
export class StrategyModule {}
