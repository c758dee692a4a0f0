/**
 * grammY wiring: command handlers in, HTML messages out.
 */

import { Bot, type Context } from "grammy";
import { logger } from "../middleware/logging.js";
import {
  type CommandUser,
  helpCommand,
  muteCommand,
  revokeCommand,
  startCommand,
  statusCommand,
  unmuteCommand,
} from "./commands.js";

/** Sends one pre-rendered HTML chunk to a chat. Rejects on failure. */
export type MessageSender = (chatId: string, html: string) => Promise<void>;

export function commandUser(ctx: Context): CommandUser | null {
  if (!ctx.from || !ctx.chat) return null;
  const fullName = [ctx.from.first_name, ctx.from.last_name].filter(Boolean).join(" ");
  return {
    platformUserId: String(ctx.from.id),
    chatId: String(ctx.chat.id),
    displayName: fullName || ctx.from.username,
  };
}

function reply(handler: (user: CommandUser) => Promise<string> | string) {
  return async (ctx: Context) => {
    const user = commandUser(ctx);
    if (!user) return;
    const text = await handler(user);
    await ctx.reply(text, { parse_mode: "HTML" });
  };
}

export function createBot(token: string): Bot {
  const bot = new Bot(token);

  bot.command("start", reply(startCommand));
  bot.command("revoke", reply(revokeCommand));
  bot.command("status", reply(statusCommand));
  bot.command("mute", reply(muteCommand));
  bot.command("unmute", reply(unmuteCommand));
  bot.command("help", reply(helpCommand));

  bot.catch((err) => {
    logger.error("Telegram update failed", err.error instanceof Error ? err.error : undefined, {
      updateId: err.ctx.update.update_id,
    });
  });

  return bot;
}

export function createTelegramSender(bot: Bot): MessageSender {
  return async (chatId, html) => {
    await bot.api.sendMessage(chatId, html, {
      parse_mode: "HTML",
      link_preview_options: { is_disabled: true },
    });
  };
}
