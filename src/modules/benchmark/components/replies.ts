import type { EmbedBuilder } from 'discord.js';
import { fieldsEmbed } from '../../../shared/utils/embed.js';
import type { BenchmarkReply } from '../types.js';

/**
 * Discord reply payload for a facade reply
 */
export type BenchmarkReplyPayload =
  | { content: string }
  | { embeds: EmbedBuilder[] };

export function toReplyPayload(reply: BenchmarkReply): BenchmarkReplyPayload {
  switch (reply.kind) {
    case 'message':
      return { content: reply.content };
    case 'embed':
      return { embeds: [fieldsEmbed(reply.title, reply.color, reply.fields)] };
  }
}
