import { ConfigService } from '@nestjs/config';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CollectionRepository } from './collection.repository';

describe('CollectionRepository', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'collection-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createRepository(): CollectionRepository {
    return new CollectionRepository(new ConfigService({ collection: { path: join(dir, 'collection.csv') } }));
  }

  it('loads owned names from the collection file', async () => {
    await writeFile(join(dir, 'collection.csv'), 'Count,Name\n1,Goblin Warchief\n0,Goblin Lackey\n2,Goblin Warchief\n');

    const owned = await createRepository().getOwnedNames();

    expect(Array.from(owned)).toEqual(['Goblin Warchief']);
  });

  it('returns an empty set when the file is missing', async () => {
    const owned = await createRepository().getOwnedNames();

    expect(owned.size).toBe(0);
  });

  it('caches the first read until forced', async () => {
    const file = join(dir, 'collection.csv');
    await writeFile(file, 'Count,Name\n1,Sol Ring\n');
    const repository = createRepository();

    await repository.getOwnedNames();
    await writeFile(file, 'Count,Name\n1,Arcane Signet\n');

    expect(Array.from(await repository.getOwnedNames())).toEqual(['Sol Ring']);
    expect(Array.from(await repository.getOwnedNames(true))).toEqual(['Arcane Signet']);
  });
});
