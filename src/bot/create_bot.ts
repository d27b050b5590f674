import { Markup, Telegraf } from "telegraf";
import { getLogger, withUpdateContext } from "../util/logger";
import {
  COMMANDS,
  CommandHandlers,
  isCallbackAction,
  KeyboardLayout,
  needsTypingIndicator,
  ReplyPayload,
} from "./handlers";
import { BOT_ERROR_MESSAGE } from "./messages";

type InlineKeyboardMarkup = ReturnType<typeof Markup.inlineKeyboard>["reply_markup"];

function toInlineKeyboard(layout: KeyboardLayout): InlineKeyboardMarkup {
  return Markup.inlineKeyboard(
    layout.map(row =>
      row.map(button => Markup.button.callback(button.text, button.action))
    )
  ).reply_markup;
}

function replyExtra(reply: ReplyPayload) {
  return {
    parse_mode: "Markdown" as const,
    link_preview_options: { is_disabled: true },
    ...(reply.keyboard ? { reply_markup: toInlineKeyboard(reply.keyboard) } : {}),
  };
}

/**
 * Wires command and button handlers into a Telegraf instance.
 * The caller owns launching and stopping it.
 */
export function createBot(token: string, handlers: CommandHandlers): Telegraf {
  const logger = getLogger("bot");
  const bot = new Telegraf(token);

  for (const command of COMMANDS) {
    bot.command(command, async ctx => {
      const log = withUpdateContext("bot", {
        updateId: ctx.update.update_id,
        chatId: ctx.chat?.id,
        command,
      });
      log.info("command received");
      if (needsTypingIndicator(command)) {
        await ctx.sendChatAction("typing");
      }
      const reply = await handlers.handleCommand(command, {
        firstName: ctx.from?.first_name,
      });
      await ctx.reply(reply.text, replyExtra(reply));
    });
  }

  bot.on("callback_query", async ctx => {
    await ctx.answerCbQuery();
    const data =
      "data" in ctx.callbackQuery ? ctx.callbackQuery.data : undefined;
    if (!data || !isCallbackAction(data)) {
      logger.warn({ data }, "ignoring unknown callback");
      return;
    }

    await ctx.sendChatAction("typing");
    const reply = await handlers.handleCallback(data);
    if (reply.mode === "edit") {
      await ctx.editMessageText(reply.text, replyExtra(reply));
    } else {
      await ctx.reply(reply.text, replyExtra(reply));
    }
  });

  bot.catch(async (err, ctx) => {
    logger.error({ err, updateId: ctx.update.update_id }, "update failed");
    if (!ctx.chat) return;
    try {
      await ctx.reply(BOT_ERROR_MESSAGE, { parse_mode: "Markdown" });
    } catch (replyErr) {
      logger.error({ err: replyErr }, "error reply failed");
    }
  });

  return bot;
}
