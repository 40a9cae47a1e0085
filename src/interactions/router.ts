import { Events, type Client, type Interaction } from "discord.js";
import type { BotContext } from "../bot/context.js";
import { findSlashCommand } from "../commands/slash/index.js";
import { handleButton } from "../games/blackjack/commands.js";
import { sendPublicError, type Repliable } from "../lib/errorReply.js";
import { buildErrorId, normalizeError } from "../utils/errors.js";
import { logCmdEnd, logCmdStart, type LogCtx } from "../utils/logger.js";

/** What the router needs from any interaction it answers. */
export interface RoutedInteraction extends Repliable {
  readonly channelId: string | null;
  readonly guildId: string | null;
  readonly guild?: { readonly name: string } | null;
  readonly user: { readonly id: string; readonly tag: string };
}

function logCtx(i: RoutedInteraction, command: string): LogCtx {
  return {
    guild: { id: i.guildId, name: i.guild?.name },
    channel: { id: i.channelId },
    user: { id: i.user.id, tag: i.user.tag },
    command,
  };
}

async function failInteraction(i: RoutedInteraction, ctx: BotContext, command: string, err: unknown) {
  const errorId = buildErrorId();
  ctx.log.error({ msg: "interaction_failed", command, errorId, channelId: i.channelId, userId: i.user.id, error: normalizeError(err) });
  const delivered = await sendPublicError(i, {
    title: "Something went wrong",
    message: "An error occurred while processing your request. Please try again.",
    errorId,
  });
  if (!delivered) ctx.log.warn({ msg: "error_reply_undelivered", command, errorId });
}

/**
 * Runs one handler for an interaction. A throw is logged under a fresh error id
 * and answered with a public error embed carrying that id; returns false then.
 */
export async function runGuarded(i: RoutedInteraction, ctx: BotContext, command: string, run: () => Promise<void>): Promise<boolean> {
  try {
    await run();
    return true;
  } catch (err) {
    await failInteraction(i, ctx, command, err);
    return false;
  }
}

export async function routeInteraction(i: Interaction, ctx: BotContext): Promise<void> {
  if (i.isChatInputCommand()) {
    const command = findSlashCommand(i.commandName);
    if (!command) {
      ctx.log.warn({ msg: "unknown_command", command: i.commandName });
      return;
    }
    const started = Date.now();
    const lc = logCtx(i, i.commandName);
    logCmdStart(lc);
    const ok = await runGuarded(i, ctx, i.commandName, () => command.execute(i, ctx));
    logCmdEnd({ ...lc, ok, ms: Date.now() - started });
    return;
  }

  if (i.isButton()) {
    await runGuarded(i, ctx, `button:${i.customId}`, async () => {
      const handled = await handleButton(i, ctx);
      if (!handled) ctx.log.debug({ msg: "button_unrouted", customId: i.customId });
    });
  }
}

export function initInteractionRouter(client: Client, ctx: BotContext) {
  client.on(Events.InteractionCreate, (i: Interaction) => {
    routeInteraction(i, ctx).catch((err) => {
      ctx.log.error({ msg: "interaction_router_crash", error: normalizeError(err) });
    });
  });
}
