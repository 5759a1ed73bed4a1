import {
  PermissionFlagsBits,
  type ChatInputCommandInteraction,
  type PermissionsBitField,
} from 'discord.js';
import { isBotOwner } from '../../config/environment.js';
import { errorEmbed } from './embed.js';

/**
 * Permission check result
 */
export type PermissionCheckResult =
  | { allowed: true }
  | { allowed: false; reason: string };

/**
 * Check if a user is either a bot owner OR has admin permissions
 */
export function checkBotOwnerOrAdmin(
  userId: string,
  memberPermissions: Readonly<PermissionsBitField> | null
): PermissionCheckResult {
  // Bot owners always pass
  if (isBotOwner(userId)) {
    return { allowed: true };
  }

  if (memberPermissions?.has(PermissionFlagsBits.Administrator)) {
    return { allowed: true };
  }

  return {
    allowed: false,
    reason: 'This command requires Administrator permissions or bot owner status.',
  };
}

/**
 * Require bot owner OR admin permissions for an interaction.
 * Returns true if the user passes; otherwise replies with an error and returns false.
 */
export async function requireBotOwnerOrAdmin(
  interaction: ChatInputCommandInteraction
): Promise<boolean> {
  const check = checkBotOwnerOrAdmin(interaction.user.id, interaction.memberPermissions);

  if (!check.allowed) {
    const replyOptions = {
      embeds: [errorEmbed('Permission Denied', check.reason)],
      ephemeral: true,
    };

    if (interaction.replied || interaction.deferred) {
      await interaction.followUp(replyOptions);
    } else {
      await interaction.reply(replyOptions);
    }
    return false;
  }

  return true;
}
