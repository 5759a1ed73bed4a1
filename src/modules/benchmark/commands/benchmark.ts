import {
  SlashCommandBuilder,
  type AutocompleteInteraction,
  type ChatInputCommandInteraction,
  type User,
} from 'discord.js';
import { defineSlashCommand } from '../../../types/command.types.js';
import { errorEmbed } from '../../../shared/utils/embed.js';
import { requireBotOwnerOrAdmin } from '../../../shared/utils/permissions.js';
import { Logger } from '../../../shared/utils/logger.js';
import { PersistenceError } from '../errors.js';
import { toReplyPayload } from '../components/replies.js';
import type { BenchmarkFacade } from '../services/BenchmarkFacade.js';
import type { BenchmarkReply, UserRef } from '../types.js';

const logger = new Logger('Benchmark:Command');

const CATEGORY_MAX_LENGTH = 100;

let benchmarkFacade: BenchmarkFacade | null = null;

export function setBenchmarkFacade(facade: BenchmarkFacade | null): void {
  benchmarkFacade = facade;
}

function toUserRef(user: User): UserRef {
  return { id: user.id, name: user.displayName };
}

export const command = defineSlashCommand(
  new SlashCommandBuilder()
    .setName('benchmark')
    .setDescription('Track benchmark scores and view leaderboards')
    .addSubcommand((sub) =>
      sub
        .setName('add')
        .setDescription('Submit a benchmark score (only your best is kept)')
        .addStringOption((opt) =>
          opt
            .setName('category')
            .setDescription('Benchmark type, e.g. cpu')
            .setRequired(true)
            .setMaxLength(CATEGORY_MAX_LENGTH)
        )
        .addNumberOption((opt) =>
          opt
            .setName('score')
            .setDescription('Your score')
            .setRequired(true)
        )
    )
    .addSubcommand((sub) =>
      sub
        .setName('view')
        .setDescription('View the top 10 for a benchmark type')
        .addStringOption((opt) =>
          opt
            .setName('category')
            .setDescription('Benchmark type')
            .setRequired(true)
            .setMaxLength(CATEGORY_MAX_LENGTH)
            .setAutocomplete(true)
        )
    )
    .addSubcommand((sub) =>
      sub
        .setName('types')
        .setDescription('List all benchmark types')
    )
    .addSubcommand((sub) =>
      sub
        .setName('delete')
        .setDescription('Delete a benchmark type or one user\'s score (Admin only)')
        .addStringOption((opt) =>
          opt
            .setName('category')
            .setDescription('Benchmark type')
            .setRequired(true)
            .setMaxLength(CATEGORY_MAX_LENGTH)
            .setAutocomplete(true)
        )
        .addUserOption((opt) =>
          opt
            .setName('user')
            .setDescription('Only delete this user\'s score')
            .setRequired(false)
        )
    )
    .addSubcommand((sub) =>
      sub
        .setName('history')
        .setDescription('View a user\'s best scores in every benchmark')
        .addUserOption((opt) =>
          opt
            .setName('user')
            .setDescription('User to check (defaults to yourself)')
            .setRequired(false)
        )
    )
    .addSubcommand((sub) =>
      sub
        .setName('leaderboard')
        .setDescription('View the top 3 of every benchmark type')
    ),

  async (interaction: ChatInputCommandInteraction) => {
    if (!benchmarkFacade) {
      await interaction.reply({
        embeds: [errorEmbed('Error', 'Benchmark service not available')],
        ephemeral: true,
      });
      return;
    }

    const subcommand = interaction.options.getSubcommand();

    try {
      const reply = await dispatch(interaction, benchmarkFacade, subcommand);
      if (reply) {
        await interaction.reply(toReplyPayload(reply));
      }
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      logger.error(`benchmark ${subcommand} could not be saved:`, error);
      await interaction.reply({
        embeds: [errorEmbed('Not Saved', 'The leaderboard could not be saved. Nothing was changed, please try again.')],
        ephemeral: true,
      });
    }
  },
  {
    cooldown: 2,
    autocomplete: async (interaction: AutocompleteInteraction) => {
      const typed = interaction.options.getFocused();
      const suggestions = benchmarkFacade?.categorySuggestions(typed) ?? [];
      await interaction.respond(
        suggestions.map((category) => ({ name: category, value: category }))
      );
    },
  }
);

/**
 * Run a subcommand. Returns null when a reply has already been sent.
 */
async function dispatch(
  interaction: ChatInputCommandInteraction,
  facade: BenchmarkFacade,
  subcommand: string
): Promise<BenchmarkReply | null> {
  switch (subcommand) {
    case 'add':
      return facade.add(
        interaction.user.id,
        interaction.options.getString('category', true),
        interaction.options.getNumber('score', true)
      );
    case 'view':
      return facade.view(interaction.options.getString('category', true));
    case 'types':
      return facade.types();
    case 'delete': {
      if (!(await requireBotOwnerOrAdmin(interaction))) {
        return null;
      }
      const user = interaction.options.getUser('user');
      return facade.delete(
        interaction.options.getString('category', true),
        user ? toUserRef(user) : undefined
      );
    }
    case 'history': {
      const user = interaction.options.getUser('user');
      return facade.history(toUserRef(interaction.user), user ? toUserRef(user) : undefined);
    }
    case 'leaderboard':
      return facade.overview();
    default:
      logger.warn(`Unknown benchmark subcommand: ${subcommand}`);
      return null;
  }
}
