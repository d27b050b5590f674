/**
 * Command and button handlers. They build reply payloads and leave delivery
 * to the Telegraf wiring in create_bot.ts.
 */
import { formatUtc } from "../market/format";
import type { ReportComposer } from "../reporting/compose_report";
import { BOT_IDENTITY, BotIdentity } from "./identity";
import {
  aboutMessage,
  formatUptime,
  helpMessage,
  menuMessage,
  welcomeMessage,
} from "./messages";

export const COMMANDS = [
  "start",
  "alpha",
  "btc",
  "trending",
  "defi",
  "menu",
  "help",
  "about",
] as const;

export type CommandName = (typeof COMMANDS)[number];

export const CALLBACK_ACTIONS = [
  "get_alpha",
  "get_btc",
  "get_trending",
  "get_defi",
  "show_menu",
  "show_help",
  "show_about",
] as const;

export type CallbackAction = (typeof CALLBACK_ACTIONS)[number];

export const COMMAND_DESCRIPTIONS: ReadonlyArray<{
  command: CommandName;
  description: string;
}> = [
  { command: "start", description: "Welcome & quick buttons" },
  { command: "alpha", description: "Market summary" },
  { command: "btc", description: "Bitcoin price" },
  { command: "trending", description: "Hot coins" },
  { command: "defi", description: "Top DeFi projects" },
  { command: "menu", description: "All options" },
  { command: "help", description: "Detailed help guide" },
  { command: "about", description: "Bot information" },
];

export interface KeyboardButton {
  text: string;
  action: CallbackAction;
}

export type KeyboardLayout = KeyboardButton[][];

export interface ReplyPayload {
  text: string;
  keyboard?: KeyboardLayout;
}

/** "edit" replaces the message the button belongs to; "send" posts a new one. */
export interface CallbackReply extends ReplyPayload {
  mode: "edit" | "send";
}

const DATA_COMMANDS: ReadonlySet<CommandName> = new Set([
  "alpha",
  "btc",
  "trending",
  "defi",
]);

/** Commands that hit the providers show a typing indicator first. */
export function needsTypingIndicator(command: CommandName): boolean {
  return DATA_COMMANDS.has(command);
}

export function isCallbackAction(data: string): data is CallbackAction {
  return CALLBACK_ACTIONS.some(action => action === data);
}

export const START_KEYBOARD: KeyboardLayout = [
  [
    { text: "📊 Market Alpha", action: "get_alpha" },
    { text: "₿ Bitcoin", action: "get_btc" },
  ],
  [
    { text: "🔥 Trending", action: "get_trending" },
    { text: "🏗️ DeFi", action: "get_defi" },
  ],
  [
    { text: "📋 Menu", action: "show_menu" },
    { text: "ℹ️ Help", action: "show_help" },
  ],
];

export const MENU_KEYBOARD: KeyboardLayout = [
  [
    { text: "📊 Alpha", action: "get_alpha" },
    { text: "₿ Bitcoin", action: "get_btc" },
  ],
  [
    { text: "🔥 Trending", action: "get_trending" },
    { text: "🏗️ DeFi", action: "get_defi" },
  ],
  [
    { text: "ℹ️ Help", action: "show_help" },
    { text: "📝 About", action: "show_about" },
  ],
];

export interface CommandHandlerDependencies {
  composer: ReportComposer;
  startedAt: Date;
  now?: () => Date;
  bot?: BotIdentity;
}

export interface CommandHandlers {
  handleCommand(
    command: CommandName,
    from?: { firstName?: string }
  ): Promise<ReplyPayload>;
  handleCallback(action: CallbackAction): Promise<CallbackReply>;
}

export function createCommandHandlers(
  deps: CommandHandlerDependencies
): CommandHandlers {
  const { composer, startedAt } = deps;
  const now = deps.now ?? (() => new Date());
  const bot = deps.bot ?? BOT_IDENTITY;

  function about(): ReplyPayload {
    const uptime = formatUptime(now().getTime() - startedAt.getTime());
    return { text: aboutMessage(bot, uptime, formatUtc(startedAt)) };
  }

  async function handleCommand(
    command: CommandName,
    from: { firstName?: string } = {}
  ): Promise<ReplyPayload> {
    switch (command) {
      case "start":
        return {
          text: welcomeMessage(bot, from.firstName),
          keyboard: START_KEYBOARD,
        };
      case "alpha":
        return { text: await composer.composeMarketReport() };
      case "btc":
        return { text: await composer.composeBitcoinReport("command") };
      case "trending":
        return { text: await composer.composeTrendingReport("command") };
      case "defi":
        return { text: await composer.composeDefiReport("command") };
      case "menu":
        return { text: menuMessage(bot), keyboard: MENU_KEYBOARD };
      case "help":
        return { text: helpMessage(bot) };
      case "about":
        return about();
    }
  }

  async function handleCallback(
    action: CallbackAction
  ): Promise<CallbackReply> {
    switch (action) {
      case "get_alpha":
        return { mode: "edit", text: await composer.composeMarketReport() };
      case "get_btc":
        return {
          mode: "edit",
          text: await composer.composeBitcoinReport("button"),
        };
      case "get_trending":
        return {
          mode: "edit",
          text: await composer.composeTrendingReport("button"),
        };
      case "get_defi":
        return {
          mode: "edit",
          text: await composer.composeDefiReport("button"),
        };
      case "show_menu":
        return { mode: "send", ...(await handleCommand("menu")) };
      case "show_help":
        return { mode: "send", ...(await handleCommand("help")) };
      case "show_about":
        return { mode: "send", ...about() };
    }
  }

  return { handleCommand, handleCallback };
}
