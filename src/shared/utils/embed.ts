import { EmbedBuilder, type ColorResolvable } from 'discord.js';

/**
 * Standard embed colors used throughout the bot
 */
export const COLORS = {
  primary: 0x3498DB,    // Blue
  success: 0x2ECC71,    // Green
  highlight: 0x9B59B6,  // Purple
  error: 0xED4245,      // Red
} as const;

/**
 * Discord embed limits
 */
export const EMBED_LIMITS = {
  title: 256,
  fieldName: 256,
  fieldValue: 1024,
  fields: 25,
} as const;

/**
 * A single embed field in platform-neutral form
 */
export interface EmbedFieldData {
  name: string;
  value: string;
  inline: boolean;
}

/**
 * Create a base embed with consistent styling
 */
export function createEmbed(color: ColorResolvable = COLORS.primary): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(color)
    .setTimestamp();
}

/**
 * Create an error embed
 */
export function errorEmbed(
  title: string,
  description?: string
): EmbedBuilder {
  const embed = createEmbed(COLORS.error).setTitle(`❌ ${title}`);
  if (description) {
    embed.setDescription(description);
  }
  return embed;
}

/**
 * Truncate a string to Discord's limit, ending with an ellipsis
 */
export function truncateField(value: string, maxLength: number = EMBED_LIMITS.fieldValue): string {
  if (value.length <= maxLength) {
    return value;
  }
  return value.slice(0, maxLength - 3) + '...';
}

/**
 * Build an embed from a title and fields, clamped to Discord's limits
 */
export function fieldsEmbed(
  title: string,
  color: number,
  fields: EmbedFieldData[]
): EmbedBuilder {
  const embed = createEmbed(color).setTitle(truncateField(title, EMBED_LIMITS.title));

  const clamped = fields.slice(0, EMBED_LIMITS.fields).map((field) => ({
    name: truncateField(field.name, EMBED_LIMITS.fieldName),
    value: truncateField(field.value, EMBED_LIMITS.fieldValue),
    inline: field.inline,
  }));

  if (clamped.length > 0) {
    embed.addFields(clamped);
  }

  return embed;
}
