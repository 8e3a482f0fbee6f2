// pattern: Imperative Shell
import type { Logger } from "pino";

const TELEGRAM_API_BASE = "https://api.telegram.org";

/**
 * Discriminated union result type for chat message send operations.
 */
export type SendResult =
  | { readonly success: true; readonly messageId: number | null }
  | { readonly success: false; readonly error: string };

/**
 * Sends one text message to a chat. Never throws — errors are returned in the
 * result.
 */
export type Notifier = {
  readonly send: (chatId: string, text: string) => Promise<SendResult>;
};

type TelegramReply = {
  readonly ok?: boolean;
  readonly description?: string;
  readonly result?: { readonly message_id?: number };
};

function isTelegramReply(value: unknown): value is TelegramReply {
  return typeof value === "object" && value !== null;
}

/**
 * Creates a notifier backed by the Telegram Bot API `sendMessage` method.
 *
 * @param token - Bot token issued by BotFather
 * @param timeoutMs - Upper bound for a single send request
 * @returns A Notifier bound to the bot credentials
 */
export function createTelegramNotifier(
  token: string,
  timeoutMs: number,
  logger: Logger,
): Notifier {
  const url = `${TELEGRAM_API_BASE}/bot${token}/sendMessage`;

  return {
    async send(chatId: string, text: string): Promise<SendResult> {
      try {
        const response = await fetch(url, {
          method: "POST",
          signal: AbortSignal.timeout(timeoutMs),
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ chat_id: chatId, text }),
        });

        const reply: unknown = await response.json().catch(() => null);
        const parsed: TelegramReply = isTelegramReply(reply) ? reply : {};

        if (!response.ok || parsed.ok !== true) {
          const error =
            parsed.description ??
            `HTTP ${response.status}: ${response.statusText}`;
          logger.error({ chatId, error }, "telegram message send failed");
          return { success: false, error };
        }

        const messageId = parsed.result?.message_id ?? null;
        logger.info({ chatId, messageId }, "telegram message sent");
        return { success: true, messageId };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ chatId, error: message }, "telegram message send failed");
        return { success: false, error: message };
      }
    },
  };
}
