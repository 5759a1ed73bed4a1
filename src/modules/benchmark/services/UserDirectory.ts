import { DiscordAPIError, RESTJSONErrorCodes, type Client } from 'discord.js';
import type { UserId } from '../types.js';

/**
 * Resolves user ids to display names for rendering
 */
export interface UserDirectory {
  /** Display name, or null when the user no longer exists */
  displayName(userId: UserId): Promise<string | null>;
}

/**
 * UserDirectory backed by the Discord API (cached by discord.js)
 */
export class DiscordUserDirectory implements UserDirectory {
  constructor(private readonly client: Client) {}

  async displayName(userId: UserId): Promise<string | null> {
    try {
      const user = await this.client.users.fetch(userId);
      return user.displayName;
    } catch (error) {
      if (error instanceof DiscordAPIError && error.code === RESTJSONErrorCodes.UnknownUser) {
        return null;
      }
      throw error;
    }
  }
}
