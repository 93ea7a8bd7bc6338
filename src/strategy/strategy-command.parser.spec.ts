import { parseStrategyCommand, toStrategyCommand } from './strategy-command.parser';

describe('parseStrategyCommand', () => {
  it('parses a bare command object', () => {
    const text = '{"function": "select_cards", "strategy": "Goblin Tribal", "keywords": ["Goblin", "Token", "Haste"]}';

    expect(parseStrategyCommand(text)).toEqual({
      label: 'Goblin Tribal',
      keywords: ['Goblin', 'Token', 'Haste'],
    });
  });

  it('finds the object inside surrounding prose and fences', () => {
    const text = [
      'Sure! Here is the command:',
      '```json',
      '{"strategy": "Artifact Ramp", "keywords": ["artifact", "treasure"]}',
      '```',
      'Good luck!',
    ].join('\n');

    expect(parseStrategyCommand(text)).toEqual({
      label: 'Artifact Ramp',
      keywords: ['artifact', 'treasure'],
    });
  });

  it('reads the inner object when the command is wrapped', () => {
    expect(parseStrategyCommand('{"command": {"strategy": "Lifegain", "keywords": ["lifelink"]}}')).toEqual({
      label: 'Lifegain',
      keywords: ['lifelink'],
    });
  });

  it('accepts label as an alias for strategy and trims it', () => {
    expect(parseStrategyCommand('{"label": "  Voltron ", "keywords": []}')).toEqual({
      label: 'Voltron',
      keywords: [],
    });
  });

  it.each([
    ['empty text', ''],
    ['no object', 'Goblin Tribal with haste'],
    ['invalid JSON', '{"strategy": "Lifegain", keywords: [lifelink]}'],
    ['missing keywords', '{"strategy": "Lifegain"}'],
    ['keywords not a list', '{"strategy": "Lifegain", "keywords": "lifelink"}'],
    ['non-string keyword', '{"strategy": "Lifegain", "keywords": ["lifelink", 3]}'],
    ['empty strategy', '{"strategy": "   ", "keywords": ["lifelink"]}'],
    ['missing strategy', '{"keywords": ["lifelink"]}'],
    ['other function', '{"function": "build_deck", "strategy": "Lifegain", "keywords": ["lifelink"]}'],
  ])('returns null for %s', (_, text) => {
    expect(parseStrategyCommand(text)).toBeNull();
  });

  it('returns null for null input', () => {
    expect(parseStrategyCommand(null)).toBeNull();
  });
});

describe('toStrategyCommand', () => {
  it('rejects arrays and primitives', () => {
    expect(toStrategyCommand(['Goblin'])).toBeNull();
    expect(toStrategyCommand('Goblin Tribal')).toBeNull();
    expect(toStrategyCommand(null)).toBeNull();
  });

  it('copies the keyword list', () => {
    const keywords = ['goblin'];
    const command = toStrategyCommand({ strategy: 'Goblins', keywords });

    expect(command?.keywords).toEqual(['goblin']);
    expect(command?.keywords).not.toBe(keywords);
  });
});
