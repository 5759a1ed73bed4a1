import type {
  SlashCommandBuilder,
  SlashCommandSubcommandsOnlyBuilder,
  ChatInputCommandInteraction,
  AutocompleteInteraction,
} from 'discord.js';

/**
 * Function signature for slash command execution
 */
export type SlashCommandExecute = (
  interaction: ChatInputCommandInteraction
) => Promise<void> | void;

/**
 * Function signature for autocomplete handling
 */
export type AutocompleteHandler = (
  interaction: AutocompleteInteraction
) => Promise<void> | void;

/**
 * Slash command builder types
 */
export type SlashCommandData =
  | SlashCommandBuilder
  | SlashCommandSubcommandsOnlyBuilder
  | Omit<SlashCommandBuilder, 'addSubcommand' | 'addSubcommandGroup'>;

/**
 * Slash command definition
 */
export interface SlashCommand {
  /** Slash command builder data */
  data: SlashCommandData;

  /** Command execution handler */
  execute: SlashCommandExecute;

  /** Autocomplete handler (optional) */
  autocomplete?: AutocompleteHandler;

  /** Cooldown in seconds between uses */
  cooldown?: number;
}

export type ModuleCommand = SlashCommand;

/**
 * Helper to create a slash command definition
 */
export function defineSlashCommand(
  data: SlashCommandData,
  execute: SlashCommandExecute,
  options?: Omit<SlashCommand, 'data' | 'execute'>
): SlashCommand {
  return {
    data,
    execute,
    ...options,
  };
}
