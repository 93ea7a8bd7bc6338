import { ownedCardNames, parseCollectionCsv } from './parse-collection-csv';

describe('parseCollectionCsv', () => {
  it('reads Count and Name columns from a collection export', () => {
    const csv = [
      '"Count","Tradelist Count","Name","Edition","Condition"',
      '"1","0","Sol Ring","c21","Near Mint"',
      '"4","0","Lightning Bolt","m10","Near Mint"',
    ].join('\n');

    expect(parseCollectionCsv(csv)).toEqual([
      { name: 'Sol Ring', count: 1 },
      { name: 'Lightning Bolt', count: 4 },
    ]);
  });

  it('keeps commas and escaped quotes inside quoted names', () => {
    const csv = 'Count,Name\r\n1,"Krenko, Mob Boss"\r\n2,"Kongming, ""Sleeping Dragon"""\r\n';

    expect(parseCollectionCsv(csv)).toEqual([
      { name: 'Krenko, Mob Boss', count: 1 },
      { name: 'Kongming, "Sleeping Dragon"', count: 2 },
    ]);
  });

  it('defaults a missing count to one and unreadable counts to zero', () => {
    expect(parseCollectionCsv('Name,Count\nGoblin Guide,\nGoblin Matron,lots')).toEqual([
      { name: 'Goblin Guide', count: 1 },
      { name: 'Goblin Matron', count: 0 },
    ]);
  });

  it('returns nothing without a name column', () => {
    expect(parseCollectionCsv('Count,Edition\n1,c21')).toEqual([]);
  });
});

describe('ownedCardNames', () => {
  it('keeps unique names with a positive count', () => {
    expect(
      ownedCardNames([
        { name: 'Sol Ring', count: 1 },
        { name: 'Mana Crypt', count: 0 },
        { name: 'Sol Ring', count: 2 },
        { name: 'Goblin Guide', count: 3 },
      ]),
    ).toEqual(['Sol Ring', 'Goblin Guide']);
  });
});
