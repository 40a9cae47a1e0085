import type { ChatInputCommandInteraction, SlashCommandBuilder } from 'discord.js';
import type { BotContext } from '../../bot/context.js';
import * as BlackjackCmd from '../../games/blackjack/commands.js';
import * as RulesCmd from './rules.js';
import * as ScoreCmd from './score.js';
import * as HelpCmd from './help.js';
import * as CleanupCmd from './cleanup.js';

export type SlashCommand = {
  data: Pick<SlashCommandBuilder, 'name' | 'toJSON'>;
  execute(interaction: ChatInputCommandInteraction, ctx: BotContext): Promise<void>;
};

const commands: SlashCommand[] = [BlackjackCmd, RulesCmd, ScoreCmd, HelpCmd, CleanupCmd];

export function getSlashCommands(): SlashCommand[] {
  return commands;
}

export function findSlashCommand(name: string): SlashCommand | undefined {
  return commands.find((c) => c.data.name === name);
}
