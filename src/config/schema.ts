import { z } from "zod";

export const DEFAULT_ENDPOINT =
  "https://practicum.yandex.ru/api/user_api/homework_statuses/";

export const DEFAULT_VERDICTS: Readonly<Record<string, string>> = {
  approved: "The work has been reviewed: the reviewer liked everything. Hooray!",
  reviewing: "The work has been taken for review by the reviewer.",
  rejected: "The work has been reviewed: the reviewer has comments.",
};

// setTimeout clamps delays above 2^31-1 ms to 1 ms
export const MAX_POLL_INTERVAL_SECONDS = 2_147_483;

const statusServerConfigSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().min(0).max(65535).default(3000),
});

export const appConfigSchema = z.object({
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
  pollIntervalSeconds: z
    .number()
    .int()
    .positive()
    .max(MAX_POLL_INTERVAL_SECONDS)
    .default(600),
  requestTimeoutMs: z.number().int().positive().default(30000),
  verdicts: z
    .record(z.string().min(1), z.string().min(1))
    .refine((v) => Object.keys(v).length > 0, {
      message: "at least one verdict is required",
    })
    .default({ ...DEFAULT_VERDICTS }),
  statusServer: statusServerConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

const requiredSecret = (name: string) =>
  z
    .string({ required_error: `${name} is not set` })
    .trim()
    .min(1, `${name} is empty`);

export const secretsSchema = z.object({
  PRACTICUM_TOKEN: requiredSecret("PRACTICUM_TOKEN"),
  TELEGRAM_TOKEN: requiredSecret("TELEGRAM_TOKEN"),
  TELEGRAM_CHAT_ID: requiredSecret("TELEGRAM_CHAT_ID"),
});

export type Secrets = {
  readonly practicumToken: string;
  readonly telegramToken: string;
  readonly telegramChatId: string;
};
