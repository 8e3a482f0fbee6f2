import pino from "pino";
import { vi } from "vitest";
import type { Mock } from "vitest";
import { appConfigSchema } from "../config/schema";
import type { AppConfig } from "../config";
import type { ApiClient, FetchResult } from "../tracker/api-client";
import type { Notifier, SendResult } from "../notify/telegram";
import { createStatusCatalog } from "../tracker/catalog";
import type { PollerDeps } from "../tracker/poller";

export const TEST_ENDPOINT = "https://reviews.example.com/api/statuses/";
export const TEST_CHAT_ID = "123456";

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    ...appConfigSchema.parse({ endpoint: TEST_ENDPOINT }),
    ...overrides,
  };
}

export type FakeApiClient = ApiClient & {
  readonly fetchStatuses: Mock<(cursor: number) => Promise<FetchResult>>;
};

export type FakeNotifier = Notifier & {
  readonly send: Mock<(chatId: string, text: string) => Promise<SendResult>>;
};

export function okResponse(body: unknown): FetchResult {
  return { success: true, body };
}

/**
 * An ApiClient whose fetchStatuses resolves the given results in order,
 * repeating the last one once the list runs out.
 */
export function createFakeApiClient(
  ...results: ReadonlyArray<FetchResult>
): FakeApiClient {
  const queue = [...results];
  const fetchStatuses = vi.fn(async (_cursor: number): Promise<FetchResult> => {
    const next = queue.length > 1 ? queue.shift() : queue[0];
    if (!next) throw new Error("fake api client has no results configured");
    return next;
  });
  return { fetchStatuses };
}

export function createFakeNotifier(
  result: SendResult = { success: true, messageId: 1 },
): FakeNotifier {
  return {
    send: vi.fn(async (_chatId: string, _text: string) => result),
  };
}

export function createTestPollerDeps(
  overrides?: Partial<PollerDeps>,
): PollerDeps {
  const config = createTestConfig();
  return {
    apiClient: createFakeApiClient(
      okResponse({ homeworks: [], current_date: 100 }),
    ),
    notifier: createFakeNotifier(),
    catalog: createStatusCatalog(config.verdicts),
    chatId: TEST_CHAT_ID,
    pollIntervalMs: 600_000,
    logger: pino({ level: "silent" }),
    now: () => 50_000,
    ...overrides,
  };
}
