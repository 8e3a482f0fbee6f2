import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Logger } from "pino";
import { createTelegramNotifier } from "./telegram";

describe("createTelegramNotifier", () => {
  let mockLogger: Logger;

  beforeEach(() => {
    mockLogger = {
      info: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      fatal: vi.fn(),
      trace: vi.fn(),
      level: "info" as const,
      child: vi.fn(),
      isLevelEnabled: vi.fn(),
    } as unknown as Logger;
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should post the message to sendMessage and return the message id", async () => {
    const mockFetch = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      statusText: "OK",
      json: vi.fn().mockResolvedValue({ ok: true, result: { message_id: 42 } }),
    });
    vi.stubGlobal("fetch", mockFetch);

    const notifier = createTelegramNotifier("test-bot-token", 5000, mockLogger);
    const result = await notifier.send("123456", "hello");

    expect(result).toEqual({ success: true, messageId: 42 });
    expect(mockFetch).toHaveBeenCalledWith(
      "https://api.telegram.org/bottest-bot-token/sendMessage",
      {
        method: "POST",
        signal: expect.any(AbortSignal),
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ chat_id: "123456", text: "hello" }),
      },
    );
    expect(mockLogger.info).toHaveBeenCalledWith(
      { chatId: "123456", messageId: 42 },
      "telegram message sent",
    );
  });

  it("should return the API description when Telegram rejects the message", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue({
        ok: false,
        status: 400,
        statusText: "Bad Request",
        json: vi.fn().mockResolvedValue({
          ok: false,
          description: "Bad Request: chat not found",
        }),
      }),
    );

    const notifier = createTelegramNotifier("test-bot-token", 5000, mockLogger);
    const result = await notifier.send("123456", "hello");

    expect(result).toEqual({
      success: false,
      error: "Bad Request: chat not found",
    });
    expect(mockLogger.error).toHaveBeenCalledWith(
      { chatId: "123456", error: "Bad Request: chat not found" },
      "telegram message send failed",
    );
  });

  it("should fall back to the HTTP status when the body is not JSON", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue({
        ok: false,
        status: 502,
        statusText: "Bad Gateway",
        json: vi.fn().mockRejectedValue(new SyntaxError("Unexpected token <")),
      }),
    );

    const notifier = createTelegramNotifier("test-bot-token", 5000, mockLogger);
    const result = await notifier.send("123456", "hello");

    expect(result).toEqual({ success: false, error: "HTTP 502: Bad Gateway" });
  });

  it("should return failure result without throwing on network error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("fetch failed")));

    const notifier = createTelegramNotifier("test-bot-token", 5000, mockLogger);
    const result = await notifier.send("123456", "hello");

    expect(result).toEqual({ success: false, error: "fetch failed" });
  });

  it("should handle non-Error exceptions gracefully", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue("String error"));

    const notifier = createTelegramNotifier("test-bot-token", 5000, mockLogger);
    const result = await notifier.send("123456", "hello");

    expect(result).toEqual({ success: false, error: "String error" });
  });

  it("should report a null message id when the reply has none", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue({
        ok: true,
        status: 200,
        statusText: "OK",
        json: vi.fn().mockResolvedValue({ ok: true }),
      }),
    );

    const notifier = createTelegramNotifier("test-bot-token", 5000, mockLogger);
    const result = await notifier.send("123456", "hello");

    expect(result).toEqual({ success: true, messageId: null });
  });
});
