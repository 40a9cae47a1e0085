import {
  EmbedBuilder,
  Colors,
  type InteractionEditReplyOptions,
  type InteractionReplyOptions,
} from 'discord.js';

/** The reply surface shared by command and component interactions. */
export interface Repliable {
  readonly deferred: boolean;
  readonly replied: boolean;
  reply(options: InteractionReplyOptions): Promise<unknown>;
  editReply(options: InteractionEditReplyOptions): Promise<unknown>;
  followUp(options: InteractionReplyOptions): Promise<unknown>;
}

export function buildPublicErrorEmbed(title: string, message: string, errorId: string) {
  return new EmbedBuilder()
    .setColor(Colors.Red)
    .setTitle(`❌ ${title}`)
    .setDescription(message)
    .addFields({ name: 'Error ID', value: `\`${errorId}\`` })
    .setTimestamp();
}

/**
 * Posts a public error for an interaction in whatever state it is in:
 * reply when unanswered, editReply when deferred or replied, followUp as the
 * last resort. Returns false when none of them got through.
 */
export async function sendPublicError(ix: Repliable, opts: { title: string; message: string; errorId: string }): Promise<boolean> {
  const embed = buildPublicErrorEmbed(opts.title, opts.message, opts.errorId);
  try {
    if (!ix.deferred && !ix.replied) {
      await ix.reply({ embeds: [embed] });
    } else {
      await ix.editReply({ embeds: [embed] });
    }
    return true;
  } catch {
    // interaction may have been answered in between
    try {
      await ix.followUp({ embeds: [embed] });
      return true;
    } catch {
      return false;
    }
  }
}
