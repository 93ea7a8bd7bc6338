import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { ownedCardNames, parseCollectionCsv } from './parse-collection-csv';

@Injectable()
export class CollectionRepository {
  private readonly logger = new Logger(CollectionRepository.name);
  private readonly collectionPath: string;
  private cache: ReadonlySet<string> | null = null;
  private loadingPromise: Promise<ReadonlySet<string>> | null = null;

  constructor(private readonly configService: ConfigService) {
    this.collectionPath = resolve(
      process.cwd(),
      this.configService.get<string>('collection.path') ?? 'data/collection.csv',
    );
  }

  /**
   * Owned card names from the collection export (cached after first read).
   */
  async getOwnedNames(force = false): Promise<ReadonlySet<string>> {
    if (this.cache && !force) {
      return this.cache;
    }

    if (this.loadingPromise && !force) {
      return this.loadingPromise;
    }

    this.loadingPromise = this.readCollectionFromDisk();
    const names = await this.loadingPromise;
    this.cache = names;
    this.loadingPromise = null;
    return names;
  }

  private async readCollectionFromDisk(): Promise<ReadonlySet<string>> {
    try {
      const raw = await readFile(this.collectionPath, 'utf8');
      const names = ownedCardNames(parseCollectionCsv(raw));
      this.logger.log(`User collection loaded. Unique owned cards: ${names.length}`);
      return new Set(names);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.logger.warn(`Collection file not found at ${this.collectionPath}. Continuing without owned cards.`);
        return new Set();
      }
      this.logger.error(
        `Failed to read collection file at ${this.collectionPath}: ${(error as Error).message}`,
        error as Error,
      );
      return new Set();
    }
  }
}
