import "dotenv/config";
import { resolve } from "node:path";
import type { Server } from "node:http";
import { createLogger } from "./logger";
import { loadConfig, loadSecrets, ConfigMissingError } from "./config";
import type { AppConfig, Secrets } from "./config";
import { createApiClient, createPoller, createStatusCatalog } from "./tracker";
import { createTelegramNotifier } from "./notify/telegram";
import { createStatusServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("review-watch starting");

  let config: AppConfig;
  let secrets: Secrets;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
    secrets = loadSecrets(process.env);
  } catch (err) {
    logger.fatal(
      {
        error: err instanceof Error ? err.message : String(err),
        missing: err instanceof ConfigMissingError ? err.missing : undefined,
      },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    {
      endpoint: config.endpoint,
      pollIntervalSeconds: config.pollIntervalSeconds,
      statuses: Object.keys(config.verdicts),
    },
    "config loaded",
  );

  const apiClient = createApiClient(
    {
      endpoint: config.endpoint,
      token: secrets.practicumToken,
      timeoutMs: config.requestTimeoutMs,
    },
    logger,
  );
  const notifier = createTelegramNotifier(
    secrets.telegramToken,
    config.requestTimeoutMs,
    logger,
  );

  const poller = createPoller({
    apiClient,
    notifier,
    catalog: createStatusCatalog(config.verdicts),
    chatId: secrets.telegramChatId,
    pollIntervalMs: config.pollIntervalSeconds * 1000,
    logger,
  });

  let server: Server | null = null;
  if (config.statusServer.enabled) {
    const port = config.statusServer.port;
    server = createStatusServer({ snapshot: poller.snapshot }).listen(port, () => {
      logger.info({ port }, "status server listening");
    });
  }

  const listening = server;
  registerShutdownHandlers({
    poller,
    closeServer: listening ? () => listening.close() : null,
    logger,
  });

  await poller.start();
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
