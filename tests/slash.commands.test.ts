import { describe, test, expect } from '@jest/globals';
import { findSlashCommand, getSlashCommands } from '../src/commands/slash/index.js';
import { buildAllCommands } from '../src/register.js';

describe('slash commands', () => {
  test('registers each command once', () => {
    expect(getSlashCommands().map((c) => c.data.name)).toEqual(['blackjack', 'rules', 'score', 'help', 'cleanup']);
    expect(buildAllCommands().map((c) => c.name)).toEqual(['blackjack', 'rules', 'score', 'help', 'cleanup']);
  });

  test('lookup by name', () => {
    expect(findSlashCommand('rules')?.data.name).toBe('rules');
    expect(findSlashCommand('slots')).toBeUndefined();
  });
});
