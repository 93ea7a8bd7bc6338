import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { formatRecommendationReport } from '../src/recommendations/recommendation-report';
import { RecommendationsService } from '../src/recommendations/recommendations.service';

const DEFAULT_COMMANDER = 'Krenko, Mob Boss';

(async () => {
  const commanderName = process.argv.slice(2).join(' ').trim() || DEFAULT_COMMANDER;
  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn', 'log'] });

  try {
    const response = await app.get(RecommendationsService).recommend({ commanderName });
    console.log(`\n${formatRecommendationReport(response)}\n`);
  } finally {
    await app.close();
  }
})().catch((error: unknown) => {
  Logger.error((error as Error).message, 'Recommend');
  process.exitCode = 1;
});
