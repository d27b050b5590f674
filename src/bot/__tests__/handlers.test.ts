import {
  createCommandHandlers,
  isCallbackAction,
  MENU_KEYBOARD,
  needsTypingIndicator,
  START_KEYBOARD,
} from "@src/bot/handlers";
import { formatUptime } from "@src/bot/messages";
import type { ReportComposer } from "@src/reporting/compose_report";
import type { DetailVariant } from "@src/reporting/domain/types";

function createComposerStub() {
  return {
    buildMarketReport: jest.fn(async () => ({
      generatedAt: new Date(0),
      sections: [],
    })),
    composeMarketReport: jest.fn(async () => "market summary"),
    composeBitcoinReport: jest.fn(
      async (variant: DetailVariant) => `bitcoin ${variant}`
    ),
    composeTrendingReport: jest.fn(
      async (variant: DetailVariant) => `trending ${variant}`
    ),
    composeDefiReport: jest.fn(async (variant: DetailVariant) => `defi ${variant}`),
  } satisfies ReportComposer;
}

const STARTED_AT = new Date("2026-10-17T08:00:00Z");
const NOW = new Date("2026-10-18T09:05:07Z");

describe("command handlers", () => {
  let composer: ReturnType<typeof createComposerStub>;
  let handlers: ReturnType<typeof createCommandHandlers>;

  beforeEach(() => {
    composer = createComposerStub();
    handlers = createCommandHandlers({
      composer,
      startedAt: STARTED_AT,
      now: () => NOW,
    });
  });

  it("greets the user by first name with the quick keyboard", async () => {
    const reply = await handlers.handleCommand("start", { firstName: "Ada" });
    expect(reply.text.split("\n")[0]).toBe("👋 *Welcome Ada!*");
    expect(reply.keyboard).toBe(START_KEYBOARD);
  });

  it("delegates /alpha to the market summary", async () => {
    const reply = await handlers.handleCommand("alpha");
    expect(reply).toEqual({ text: "market summary" });
    expect(composer.composeMarketReport).toHaveBeenCalledTimes(1);
  });

  it("uses the verbose layouts for detail commands", async () => {
    await expect(handlers.handleCommand("btc")).resolves.toEqual({
      text: "bitcoin command",
    });
    await expect(handlers.handleCommand("trending")).resolves.toEqual({
      text: "trending command",
    });
    await expect(handlers.handleCommand("defi")).resolves.toEqual({
      text: "defi command",
    });
  });

  it("attaches the menu keyboard to /menu", async () => {
    const reply = await handlers.handleCommand("menu");
    expect(reply.text.split("\n")[0]).toBe("📋 *ALPHASCOPE BOT MENU*");
    expect(reply.keyboard).toBe(MENU_KEYBOARD);
  });

  it("reports version, uptime and start time in /about", async () => {
    const reply = await handlers.handleCommand("about");
    const lines = reply.text.split("\n");
    expect(lines).toContain("🔢 *Version:* 3.1.1");
    expect(lines).toContain("⏰ *Uptime:* 1 day, 1:05:07");
    expect(lines).toContain("🚀 *Started:* 2026-10-17 08:00 UTC");
  });

  it("edits the message for data buttons using the compact layouts", async () => {
    await expect(handlers.handleCallback("get_alpha")).resolves.toEqual({
      mode: "edit",
      text: "market summary",
    });
    await expect(handlers.handleCallback("get_btc")).resolves.toEqual({
      mode: "edit",
      text: "bitcoin button",
    });
    await expect(handlers.handleCallback("get_trending")).resolves.toEqual({
      mode: "edit",
      text: "trending button",
    });
    await expect(handlers.handleCallback("get_defi")).resolves.toEqual({
      mode: "edit",
      text: "defi button",
    });
  });

  it("sends a new message for menu, help and about buttons", async () => {
    const menu = await handlers.handleCallback("show_menu");
    expect(menu.mode).toBe("send");
    expect(menu.keyboard).toBe(MENU_KEYBOARD);

    const help = await handlers.handleCallback("show_help");
    expect(help.mode).toBe("send");
    expect(help.text.split("\n")[0]).toBe("🤖 *ALPHASCOPE BOT HELP GUIDE*");

    const about = await handlers.handleCallback("show_about");
    expect(about.mode).toBe("send");
    expect(about.text.split("\n")[0]).toBe("🤖 *AlphaScope Bot*");
    expect(composer.composeMarketReport).not.toHaveBeenCalled();
  });
});

describe("dispatch helpers", () => {
  it("recognizes known callback actions only", () => {
    expect(isCallbackAction("get_alpha")).toBe(true);
    expect(isCallbackAction("show_about")).toBe(true);
    expect(isCallbackAction("drop_everything")).toBe(false);
  });

  it("shows typing only for commands that fetch data", () => {
    expect(needsTypingIndicator("alpha")).toBe(true);
    expect(needsTypingIndicator("defi")).toBe(true);
    expect(needsTypingIndicator("help")).toBe(false);
    expect(needsTypingIndicator("start")).toBe(false);
  });
});

describe("formatUptime", () => {
  it("renders hours, minutes and seconds", () => {
    expect(formatUptime(0)).toBe("0:00:00");
    expect(formatUptime(59_999)).toBe("0:00:59");
    expect(formatUptime(3 * 3_600_000 + 4 * 60_000 + 5_000)).toBe("3:04:05");
  });

  it("prefixes whole days", () => {
    expect(formatUptime(25 * 3_600_000 + 61_000)).toBe("1 day, 1:01:01");
    expect(formatUptime(48 * 3_600_000)).toBe("2 days, 0:00:00");
  });
});
