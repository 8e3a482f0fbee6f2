// pattern: Imperative Shell
import type { Logger } from "pino";

export type FetchError =
  | {
      readonly kind: "Transport";
      readonly endpoint: string;
      readonly message: string;
    }
  | {
      readonly kind: "ServerStatus";
      readonly endpoint: string;
      readonly code: number;
    }
  | { readonly kind: "InvalidJson"; readonly endpoint: string };

export type FetchResult =
  | { readonly success: true; readonly body: unknown }
  | { readonly success: false; readonly error: FetchError };

/**
 * Client for the review status endpoint. Never throws; failures come back in
 * the result.
 */
export type ApiClient = {
  readonly fetchStatuses: (cursor: number) => Promise<FetchResult>;
};

export type ApiClientOptions = {
  readonly endpoint: string;
  readonly token: string;
  readonly timeoutMs: number;
};

function describeThrown(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  // undici reports the socket-level reason on `cause`
  if (err.cause instanceof Error && err.cause.message !== err.message) {
    return `${err.message} (${err.cause.message})`;
  }
  return err.message;
}

export function createApiClient(
  options: ApiClientOptions,
  logger: Logger,
): ApiClient {
  const { endpoint, token, timeoutMs } = options;

  return {
    async fetchStatuses(cursor: number): Promise<FetchResult> {
      const url = new URL(endpoint);
      url.searchParams.set("from_date", String(cursor));

      logger.debug({ endpoint, fromDate: cursor }, "requesting review statuses");

      let response: Response;
      try {
        response = await fetch(url, {
          signal: AbortSignal.timeout(timeoutMs),
          headers: {
            Authorization: `OAuth ${token}`,
            Accept: "application/json",
          },
        });
      } catch (err) {
        return {
          success: false,
          error: { kind: "Transport", endpoint, message: describeThrown(err) },
        };
      }

      if (response.status !== 200) {
        return {
          success: false,
          error: { kind: "ServerStatus", endpoint, code: response.status },
        };
      }

      let text: string;
      try {
        text = await response.text();
      } catch (err) {
        return {
          success: false,
          error: { kind: "Transport", endpoint, message: describeThrown(err) },
        };
      }

      let body: unknown;
      try {
        body = JSON.parse(text);
      } catch (err) {
        logger.debug(
          { endpoint, error: describeThrown(err) },
          "response body is not valid JSON",
        );
        return { success: false, error: { kind: "InvalidJson", endpoint } };
      }

      logger.debug({ endpoint }, "review statuses received");
      return { success: true, body };
    },
  };
}
