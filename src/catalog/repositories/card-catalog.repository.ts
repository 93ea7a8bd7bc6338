import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MtgAtomicCardsFile, MtgCard } from '@shared/types/mtg-card';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { mapAtomicCardsFile, mapCachedCard } from '../mappers/atomic-card.mapper';

@Injectable()
export class CardCatalogRepository {
  private readonly logger = new Logger(CardCatalogRepository.name);
  private readonly sourcePath: string;
  private readonly cachePath: string;
  private readonly cache = new Map<string, MtgCard>();
  private loadingPromise: Promise<void> | null = null;
  private isLoaded = false;

  constructor(private readonly configService: ConfigService) {
    this.sourcePath = resolve(
      process.cwd(),
      this.configService.get<string>('catalog.path') ?? 'data/AtomicCards.json',
    );
    this.cachePath = resolve(
      process.cwd(),
      this.configService.get<string>('catalog.cachePath') ?? 'data/commander_legal_cards.json',
    );
  }

  async findByName(name: string): Promise<MtgCard | null> {
    await this.ensureLoaded();
    return this.cache.get(name) ?? null;
  }

  async getAllCards(): Promise<MtgCard[]> {
    await this.ensureLoaded();
    return Array.from(this.cache.values());
  }

  async count(): Promise<number> {
    await this.ensureLoaded();
    return this.cache.size;
  }

  /**
   * Reads the raw AtomicCards source, writes the normalized cache and replaces
   * the in-memory catalog. Used by the cache build script.
   */
  async rebuildCache(): Promise<number> {
    const cards = await this.readSource();
    await this.writeCache(cards);
    this.replaceCards(cards);
    this.isLoaded = true;
    return cards.length;
  }

  private async ensureLoaded(): Promise<void> {
    if (this.isLoaded) {
      return;
    }

    if (!this.loadingPromise) {
      this.loadingPromise = this.load().finally(() => {
        this.loadingPromise = null;
      });
    }

    await this.loadingPromise;
  }

  private async load(): Promise<void> {
    const startTime = Date.now();
    const cached = await this.readCache();
    if (cached) {
      this.replaceCards(cached);
      this.isLoaded = true;
      this.logger.log(`Loaded ${this.cache.size} cards from ${this.cachePath} in ${Date.now() - startTime}ms`);
      return;
    }

    let cards: MtgCard[];
    try {
      cards = await this.readSource();
    } catch (error) {
      // Left unloaded so the next call retries once the source is in place.
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.logger.error(
          `Card data not found at ${this.sourcePath}. Download AtomicCards.json from MTGJSON into the data/ folder.`,
        );
      } else {
        this.logger.error(`Unable to load card data: ${(error as Error).message}`, error as Error);
      }
      return;
    }

    this.replaceCards(cards);
    this.isLoaded = true;
    this.logger.log(`Loaded ${cards.length} Commander-legal cards from source in ${Date.now() - startTime}ms`);

    try {
      await this.writeCache(cards);
    } catch (error) {
      this.logger.warn(`Unable to write catalog cache at ${this.cachePath}: ${(error as Error).message}`);
    }
  }

  private async readCache(): Promise<MtgCard[] | null> {
    try {
      const raw = await readFile(this.cachePath, 'utf8');
      const rows: unknown = JSON.parse(raw);
      if (!Array.isArray(rows)) {
        this.logger.warn(`Catalog cache at ${this.cachePath} is not a list. Rebuilding from source.`);
        return null;
      }
      return rows
        .map((row) => mapCachedCard(row))
        .filter((card): card is MtgCard => card !== null);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        this.logger.warn(`Ignoring unreadable catalog cache at ${this.cachePath}: ${(error as Error).message}`);
      }
      return null;
    }
  }

  private async readSource(): Promise<MtgCard[]> {
    this.logger.log(`Loading raw card data from ${this.sourcePath}...`);
    const raw = await readFile(this.sourcePath, 'utf8');
    let payload: MtgAtomicCardsFile;
    try {
      payload = JSON.parse(raw) as MtgAtomicCardsFile;
    } catch (error) {
      throw new Error(`Failed to decode JSON from ${this.sourcePath}: ${(error as Error).message}`);
    }

    const cards = mapAtomicCardsFile(payload);
    this.logger.log(
      `Unique cards in source: ${Object.keys(payload.data ?? {}).length}, Commander-legal: ${cards.length}`,
    );
    return cards;
  }

  private async writeCache(cards: MtgCard[]): Promise<void> {
    await mkdir(dirname(this.cachePath), { recursive: true });
    await writeFile(this.cachePath, JSON.stringify(cards), 'utf8');
    this.logger.log(`Normalized catalog saved to ${this.cachePath}`);
  }

  private replaceCards(cards: MtgCard[]): void {
    this.cache.clear();
    for (const card of cards) {
      if (!this.cache.has(card.name)) {
        this.cache.set(card.name, card);
      }
    }
  }
}
