import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { createBot, createTelegramSender } from "../src/services/telegram.js";
import { jsonResponse } from "./helpers.js";

interface FakeCtx {
  from?: { id: number; first_name: string; last_name?: string; username?: string };
  chat?: { id: number };
  reply: Mock;
}

type Handler = (ctx: FakeCtx) => Promise<void>;

interface FakeBot {
  token: string;
  command: Mock;
  catch: Mock;
  api: { sendMessage: Mock };
}

const { botInstances } = vi.hoisted(() => {
  const botInstances: FakeBot[] = [];
  return { botInstances };
});

// Mock grammy
vi.mock("grammy", () => {
  class Bot {
    command = vi.fn();
    catch = vi.fn();
    api = { sendMessage: vi.fn().mockResolvedValue({ message_id: 1 }) };

    constructor(public token: string) {
      botInstances.push(this);
    }
  }
  return { Bot };
});

function latestBot(): FakeBot {
  const bot = botInstances[botInstances.length - 1];
  if (!bot) throw new Error("no bot constructed");
  return bot;
}

function handlerFor(bot: FakeBot, name: string): Handler {
  const call = bot.command.mock.calls.find(([command]) => command === name);
  if (!call) throw new Error(`no handler for /${name}`);
  return call[1];
}

describe("createBot", () => {
  let fetchSpy: Mock<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchSpy);
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("registers every chat command", () => {
    createBot("test-bot-token");
    const bot = latestBot();

    expect(bot.token).toBe("test-bot-token");
    expect(bot.command.mock.calls.map(([name]) => name)).toEqual([
      "start",
      "revoke",
      "status",
      "mute",
      "unmute",
      "help",
    ]);
  });

  it("replies to /start in HTML with the issued key", async () => {
    createBot("test-bot-token");
    fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true, data: { apiKey: "exp_from-bot", created: true } }, 201));
    const ctx: FakeCtx = {
      from: { id: 1001, first_name: "Ada", last_name: "L" },
      chat: { id: 2002 },
      reply: vi.fn(),
    };

    await handlerFor(latestBot(), "start")(ctx);

    const [, init] = fetchSpy.mock.calls[0];
    expect(JSON.parse(String(init?.body))).toEqual({
      platformUserId: "1001",
      chatId: "2002",
      displayName: "Ada L",
    });
    expect(ctx.reply).toHaveBeenCalledTimes(1);
    const [text, options] = ctx.reply.mock.calls[0];
    expect(text).toContain("<code>exp_from-bot</code>");
    expect(options).toEqual({ parse_mode: "HTML" });
  });

  it("ignores updates without a sender", async () => {
    createBot("test-bot-token");
    const ctx: FakeCtx = { reply: vi.fn() };

    await handlerFor(latestBot(), "status")(ctx);

    expect(fetchSpy).not.toHaveBeenCalled();
    expect(ctx.reply).not.toHaveBeenCalled();
  });

  it("logs errors raised while handling an update", () => {
    createBot("test-bot-token");
    const [[onError]] = latestBot().catch.mock.calls;

    onError({ error: new Error("boom"), ctx: { update: { update_id: 7 } } });

    expect(console.error).toHaveBeenCalledTimes(1);
  });
});

describe("createTelegramSender", () => {
  it("sends HTML with link previews disabled", async () => {
    const bot = createBot("test-bot-token");
    const send = createTelegramSender(bot);

    await send("42", "<b>hi</b>");

    expect(latestBot().api.sendMessage).toHaveBeenCalledWith("42", "<b>hi</b>", {
      parse_mode: "HTML",
      link_preview_options: { is_disabled: true },
    });
  });

  it("propagates send failures", async () => {
    const bot = createBot("test-bot-token");
    latestBot().api.sendMessage.mockRejectedValueOnce(new Error("chat not found"));

    await expect(createTelegramSender(bot)("42", "x")).rejects.toThrow("chat not found");
  });
});
