import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as path from 'path';

type PremiumCardsPayload = {
  version: string;
  description?: string;
  cards: string[];
};

@Injectable()
export class PremiumCardsService {
  private readonly logger = new Logger(PremiumCardsService.name);
  private readonly premiumCardsPath: string;
  private cache: ReadonlySet<string> | null = null;
  private loadingPromise: Promise<ReadonlySet<string>> | null = null;

  constructor(private readonly configService: ConfigService) {
    this.premiumCardsPath = path.resolve(
      process.cwd(),
      this.configService.get<string>('selection.premiumCardsPath') ?? 'data/meta/premium-cards.json',
    );
  }

  /**
   * Load the premium card names from disk (cached after first read).
   */
  async getPremiumNames(force = false): Promise<ReadonlySet<string>> {
    if (this.cache && !force) {
      return this.cache;
    }

    if (this.loadingPromise && !force) {
      return this.loadingPromise;
    }

    this.loadingPromise = this.readPremiumCardsFromDisk();
    const names = await this.loadingPromise;
    this.cache = names;
    this.loadingPromise = null;
    return names;
  }

  private async readPremiumCardsFromDisk(): Promise<ReadonlySet<string>> {
    try {
      const raw = await fs.readFile(this.premiumCardsPath, 'utf-8');
      const payload = JSON.parse(raw) as PremiumCardsPayload;

      if (!Array.isArray(payload.cards)) {
        this.logger.warn(`Premium cards file at ${this.premiumCardsPath} is missing expected fields.`);
        return new Set();
      }

      const names = payload.cards.filter((name): name is string => typeof name === 'string' && name.length > 0);
      this.logger.log(`Loaded ${names.length} premium card names`);
      return new Set(names);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.logger.warn(`Premium cards file not found at ${this.premiumCardsPath}. Continuing without premium routing.`);
        return new Set();
      }
      this.logger.error(
        `Failed to read premium cards file at ${this.premiumCardsPath}: ${(error as Error).message}`,
        error as Error,
      );
      return new Set();
    }
  }
}
