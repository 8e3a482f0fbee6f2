import { existsSync, readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema, secretsSchema } from "./schema";
import type { AppConfig, Secrets } from "./schema";

/**
 * Thrown when one or more required secrets are absent from the environment.
 */
export class ConfigMissingError extends Error {
  readonly missing: ReadonlyArray<string>;

  constructor(missing: ReadonlyArray<string>, detail: string) {
    super(`missing required environment variables:\n${detail}`);
    this.name = "ConfigMissingError";
    this.missing = missing;
  }
}

/**
 * Loads settings from a YAML file. A file that does not exist yields the
 * defaults; one that cannot be read, parsed or validated throws.
 */
export function loadConfig(configPath: string): AppConfig {
  if (!existsSync(configPath)) {
    return appConfigSchema.parse({});
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw) ?? {};
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${configPath}:\n${issues}`);
  }

  return result.data;
}

/**
 * Reads the three required secrets from the given environment.
 *
 * @throws ConfigMissingError listing every absent or empty variable
 */
export function loadSecrets(env: NodeJS.ProcessEnv): Secrets {
  const result = secretsSchema.safeParse(env);
  if (!result.success) {
    const missing = result.error.issues.map((i) => i.path.join("."));
    const detail = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigMissingError(missing, detail);
  }

  return {
    practicumToken: result.data.PRACTICUM_TOKEN,
    telegramToken: result.data.TELEGRAM_TOKEN,
    telegramChatId: result.data.TELEGRAM_CHAT_ID,
  };
}

export type { AppConfig, Secrets };
