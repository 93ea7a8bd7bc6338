import 'reflect-metadata';
import { Logger, Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';
import configuration from '../src/config/configuration';
import { CatalogModule } from '../src/catalog/catalog.module';
import { CardCatalogRepository } from '../src/catalog/repositories/card-catalog.repository';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, load: [configuration] }), CatalogModule],
})
class CatalogCacheModule {}

(async () => {
  const app = await NestFactory.createApplicationContext(CatalogCacheModule);

  try {
    const count = await app.get(CardCatalogRepository).rebuildCache();
    console.log(`Generated catalog cache with ${count} Commander-legal cards`);
  } finally {
    await app.close();
  }
})().catch((error: unknown) => {
  Logger.error((error as Error).message, 'CatalogCache');
  process.exitCode = 1;
});
