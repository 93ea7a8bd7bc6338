import { ConfigService } from '@nestjs/config';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PremiumCardsService } from './premium-cards.service';

describe('PremiumCardsService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'premium-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createService(): PremiumCardsService {
    return new PremiumCardsService(
      new ConfigService({ selection: { premiumCardsPath: join(dir, 'premium-cards.json') } }),
    );
  }

  it('loads premium names', async () => {
    await writeFile(
      join(dir, 'premium-cards.json'),
      JSON.stringify({ version: '1', cards: ['Mana Crypt', 'Gaea\'s Cradle', ''] }),
    );

    const names = await createService().getPremiumNames();

    expect(Array.from(names)).toEqual(['Mana Crypt', "Gaea's Cradle"]);
  });

  it('returns an empty set for a malformed file', async () => {
    await writeFile(join(dir, 'premium-cards.json'), JSON.stringify({ version: '1' }));

    await expect(createService().getPremiumNames()).resolves.toEqual(new Set());
  });

  it('returns an empty set when the file is missing', async () => {
    await expect(createService().getPremiumNames()).resolves.toEqual(new Set());
  });

  it('ships a premium list with the project', async () => {
    const service = new PremiumCardsService(
      new ConfigService({ selection: { premiumCardsPath: join(__dirname, '../../data/meta/premium-cards.json') } }),
    );

    expect((await service.getPremiumNames()).has('Mana Crypt')).toBe(true);
  });
});
