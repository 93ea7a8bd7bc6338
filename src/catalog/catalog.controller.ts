import { Controller, Get, NotFoundException, Param } from '@nestjs/common';
import type { CatalogStats } from '@shared/contracts/recommendations';
import { CardCatalogRepository } from './repositories/card-catalog.repository';

@Controller('catalog')
export class CatalogController {
  constructor(private readonly catalogRepository: CardCatalogRepository) {}

  @Get('stats')
  async getStats(): Promise<CatalogStats> {
    return { totalCards: await this.catalogRepository.count() };
  }

  @Get('commanders/:name')
  async getCommander(@Param('name') name: string) {
    const card = await this.catalogRepository.findByName(name);
    if (!card) {
      throw new NotFoundException(`Commander '${name}' not found in the legal card database`);
    }
    return card;
  }
}
