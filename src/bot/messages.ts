/**
 * Static bot texts. Markdown (legacy) markup: `*bold*` only.
 */
import type { BotIdentity } from "./identity";

export function welcomeMessage(bot: BotIdentity, firstName?: string): string {
  return [
    `👋 *Welcome ${firstName ?? "there"}!*`,
    "",
    `🤖 I'm *${bot.name}* - your crypto intelligence assistant!`,
    "",
    "*🚀 What I can do:*",
    "• Real-time market analysis",
    "• Bitcoin & altcoin tracking",
    "• Market sentiment analysis",
    "• DeFi protocol insights",
    "• Trending cryptocurrency alerts",
    "",
    "*📱 Quick Commands:*",
    "/alpha - Market summary",
    "/btc - Bitcoin price",
    "/trending - Hot coins",
    "/defi - Top DeFi projects",
    "/menu - All options",
    "",
    "💡 *Add me to groups/channels for shared updates!*",
  ].join("\n");
}

export function menuMessage(bot: BotIdentity): string {
  return [
    `📋 *${bot.name.toUpperCase()} MENU*`,
    "",
    "*📊 Market Data:*",
    "/alpha - Complete market summary",
    "/btc - Bitcoin price & stats",
    "/trending - Trending cryptocurrencies",
    "/defi - Top DeFi protocols",
    "",
    "*🛠️ Bot Functions:*",
    "/menu - Show this menu",
    "/help - Detailed help guide",
    "/about - Bot information",
    "",
    "*💡 Pro Tips:*",
    "• Add me to groups for shared updates",
    "• Use buttons for faster access",
    "• Commands work in any chat with me",
  ].join("\n");
}

export function helpMessage(bot: BotIdentity): string {
  return [
    `🤖 *${bot.name.toUpperCase()} HELP GUIDE*`,
    "",
    "*🎯 What I Do:*",
    "I provide real-time cryptocurrency market intelligence by analyzing data from multiple sources.",
    "",
    "*📊 Data Sources:*",
    "• CoinGecko - Price & market data",
    "• DefiLlama - DeFi TVL data",
    "• Alternative.me - Sentiment analysis",
    "",
    "*💻 Available Commands:*",
    "/start - Welcome & quick buttons",
    "/alpha - Full market analysis",
    "/btc - Bitcoin price update",
    "/trending - Hot cryptocurrencies",
    "/defi - Top DeFi protocols",
    "/menu - Interactive menu",
    "/help - This help guide",
    "",
    "*🚀 How to Use:*",
    "• Personal chat: Just send any command",
    "• Groups: Add me and use commands",
    "• Channels: Add me as admin for posting",
    "",
    "*💡 Tips:*",
    "• Use buttons for faster interaction",
    "• All data is real-time and free",
    "• No configuration required!",
  ].join("\n");
}

/**
 * Elapsed time as `H:MM:SS`, prefixed by `N day(s), ` past 24 hours.
 */
export function formatUptime(elapsedMs: number): string {
  const totalSeconds = Math.max(0, Math.floor(elapsedMs / 1000));
  const days = Math.floor(totalSeconds / 86_400);
  const hours = Math.floor((totalSeconds % 86_400) / 3_600);
  const minutes = Math.floor((totalSeconds % 3_600) / 60);
  const seconds = totalSeconds % 60;
  const clock = `${hours}:${String(minutes).padStart(2, "0")}:${String(
    seconds
  ).padStart(2, "0")}`;
  if (days === 0) return clock;
  return `${days} ${days === 1 ? "day" : "days"}, ${clock}`;
}

export function aboutMessage(
  bot: BotIdentity,
  uptime: string,
  startedAt: string
): string {
  return [
    `🤖 *${bot.name}*`,
    "",
    `🔢 *Version:* ${bot.version}`,
    `⏰ *Uptime:* ${uptime}`,
    `🚀 *Started:* ${startedAt}`,
    "",
    "*🎯 Features:*",
    "• Real-time crypto market data",
    "• Bitcoin price tracking",
    "• Market sentiment analysis",
    "• DeFi protocol monitoring",
    "• Trending cryptocurrency alerts",
    "",
    "*🔧 Technical:*",
    "• Multiple API integrations",
    "• Partial data still produces a report",
    "• Works in any chat type",
    "",
    "*📜 License:* Open Source (MIT)",
  ].join("\n");
}

export const BOT_ERROR_MESSAGE = [
  "⚠️ *Something went wrong!*",
  "",
  "Please try again in a moment. If the issue persists, the APIs might be temporarily unavailable.",
  "",
  "Use /help for assistance.",
].join("\n");
