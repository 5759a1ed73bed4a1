import {
  REST,
  Routes,
  Collection,
  type ChatInputCommandInteraction,
  type AutocompleteInteraction,
  type Interaction,
} from 'discord.js';
import type { BotModule, ModuleCommand } from '../../types/module.types.js';
import { env, isDevelopment } from '../../config/environment.js';
import { Logger } from '../../shared/utils/logger.js';
import { errorEmbed } from '../../shared/utils/embed.js';
import { CooldownTracker } from './CooldownTracker.js';

const logger = new Logger('CommandManager');

/**
 * Registers module commands, deploys them to Discord and routes interactions to them.
 */
export class CommandManager {
  private rest: REST;
  private commands: Collection<string, ModuleCommand> = new Collection();

  /** Command names owned by each module */
  private moduleCommands: Map<string, string[]> = new Map();

  readonly cooldowns = new CooldownTracker();

  constructor(token: string = env.BOT_TOKEN) {
    this.rest = new REST({ version: '10' }).setToken(token);
  }

  /**
   * @param deploy Push the command list to Discord right away (after startup)
   */
  async registerModuleCommands(module: BotModule, deploy: boolean): Promise<void> {
    const moduleId = module.metadata.id;
    const names = module.commands.map((command) => {
      this.commands.set(command.data.name, command);
      return command.data.name;
    });

    this.moduleCommands.set(moduleId, names);
    logger.info(`Registered ${names.length} command(s) from module: ${moduleId}`);

    if (deploy && names.length > 0) {
      await this.deployCommands();
    }
  }

  async unregisterModuleCommands(moduleId: string, deploy: boolean): Promise<void> {
    const names = this.moduleCommands.get(moduleId) ?? [];

    for (const name of names) {
      this.commands.delete(name);
      this.cooldowns.clear(name);
    }

    this.moduleCommands.delete(moduleId);
    logger.info(`Unregistered ${names.length} command(s) from module: ${moduleId}`);

    if (deploy && names.length > 0) {
      await this.deployCommands();
    }
  }

  /**
   * Deploy to DEV_GUILD_ID in development (instant), otherwise globally.
   */
  async deployCommands(): Promise<void> {
    const body = this.commands.map(command => command.data.toJSON());

    if (body.length === 0) {
      logger.warn('No commands to deploy');
      return;
    }

    const guildId = isDevelopment ? env.DEV_GUILD_ID : undefined;
    const route = guildId
      ? Routes.applicationGuildCommands(env.CLIENT_ID, guildId)
      : Routes.applicationCommands(env.CLIENT_ID);

    try {
      await this.rest.put(route, { body });
      logger.info(`Deployed ${body.length} command(s) ${guildId ? `to guild ${guildId}` : 'globally'}`);
    } catch (error) {
      logger.error('Failed to deploy commands:', error);
      throw error;
    }
  }

  async handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      await this.handleSlashCommand(interaction);
    } else if (interaction.isAutocomplete()) {
      await this.handleAutocomplete(interaction);
    }
  }

  private async handleSlashCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    const command = this.commands.get(interaction.commandName);
    if (!command) {
      logger.warn(`Unknown command: ${interaction.commandName}`);
      return;
    }

    if (command.cooldown) {
      const remaining = this.cooldowns.check(interaction.commandName, interaction.user.id, command.cooldown);
      if (remaining !== null) {
        logger.debug(`${interaction.commandName}: ${this.cooldowns.activeCount(interaction.commandName)} user(s) cooling down`);
        await interaction.reply({
          embeds: [errorEmbed('Cooldown', `Please wait ${remaining.toFixed(1)} seconds before using this command again.`)],
          ephemeral: true,
        });
        return;
      }
    }

    try {
      await command.execute(interaction);
    } catch (error) {
      logger.error(`Error executing command ${interaction.commandName}:`, error);

      const embed = errorEmbed('Command Error', 'An error occurred while executing this command.');
      if (interaction.deferred || interaction.replied) {
        await interaction.editReply({ embeds: [embed] });
      } else {
        await interaction.reply({ embeds: [embed], ephemeral: true });
      }
    }
  }

  private async handleAutocomplete(interaction: AutocompleteInteraction): Promise<void> {
    const command = this.commands.get(interaction.commandName);
    if (!command?.autocomplete) {
      return;
    }

    try {
      await command.autocomplete(interaction);
    } catch (error) {
      logger.error(`Error in autocomplete for ${interaction.commandName}:`, error);
      if (!interaction.responded) {
        await interaction.respond([]);
      }
    }
  }
}
