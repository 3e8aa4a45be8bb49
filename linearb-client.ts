import {
  ConfigError,
  errorMessage,
  fail,
  ok,
  type ApiError,
  type Result,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export const USER_AGENT = "linearb-mcp-server/1.0.0";

/** Read requests only. The POST endpoints here are searches and queries. */
export type HttpMethod = "GET" | "POST";

export type QueryValue = string | number | boolean | undefined;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal;
}

/** What the tool handlers need from the HTTP layer; tests substitute a stub. */
export interface ApiTransport {
  send(
    method: HttpMethod,
    path: string,
    options?: RequestOptions,
  ): Promise<Result<unknown>>;
}

export interface LinearBClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export const EMPTY_RESPONSE = Object.freeze({
  status: "success",
  message: "Request completed with no content",
});

export class LinearBClient implements ApiTransport {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: LinearBClientOptions) {
    if (!options.apiKey)
      throw new ConfigError("LINEARB_API_KEY environment variable is required");
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? createLogger("LinearB API");
  }

  async send(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<Result<unknown>> {
    const url = this.buildUrl(path, options.query);
    const operation = `${method} ${path}`;

    if (options.signal?.aborted) {
      return fail({
        kind: "NETWORK_ERROR",
        reason: "cancelled",
        message: `Request cancelled before it was sent for ${operation}`,
      });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });

    const init: RequestInit = {
      method,
      headers: {
        "x-api-key": this.apiKey,
        "Content-Type": "application/json",
        Accept: "application/json",
        "User-Agent": USER_AGENT,
      },
      signal: controller.signal,
    };
    if (method === "POST" && options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }

    const startTime = Date.now();
    try {
      const response = await this.fetchImpl(url, init);
      const text = await response.text();
      this.logger.debug(
        `${operation} -> ${response.status} in ${Date.now() - startTime}ms`,
      );

      if (!response.ok) {
        const apiError = toApiError(response.status, response.statusText, text);
        this.logger.error(
          `HTTP error ${response.status} for ${operation}: ${apiError.message}`,
        );
        return fail(apiError);
      }

      return ok(parseBody(text));
    } catch (error) {
      if (timedOut) {
        const message = `Request timeout after ${this.timeoutMs}ms for ${operation}`;
        this.logger.warn(message);
        return fail({ kind: "NETWORK_ERROR", reason: "timeout", message });
      }
      if (controller.signal.aborted) {
        this.logger.debug(`Request cancelled for ${operation}`);
        return fail({
          kind: "NETWORK_ERROR",
          reason: "cancelled",
          message: `Request cancelled for ${operation}`,
        });
      }
      this.logger.warn(
        `Request error for ${operation}: ${errorMessage(error)}`,
      );
      return fail({
        kind: "NETWORK_ERROR",
        reason: "connection",
        message: `Network error: ${errorMessage(error)}`,
      });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  buildUrl(path: string, query?: Record<string, QueryValue>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }
}

function parseBody(text: string): unknown {
  if (text.trim() === "") return { ...EMPTY_RESPONSE };
  try {
    return JSON.parse(text);
  } catch {
    // CSV exports and other plain-text payloads
    return text;
  }
}

function toApiError(
  status: number,
  statusText: string,
  text: string,
): ApiError {
  const statusLine = `HTTP ${status}${statusText ? ` ${statusText}` : ""}`;
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return { kind: "API_ERROR", statusCode: status, message: statusLine };
  }
  return {
    kind: "API_ERROR",
    statusCode: status,
    message: messageFromBody(body) ?? statusLine,
    body,
  };
}

function messageFromBody(body: unknown): string | undefined {
  if (typeof body === "string") return body || undefined;
  if (typeof body !== "object" || body === null) return undefined;
  for (const key of ["message", "detail", "error"]) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value === "string" && value) return value;
  }
  return JSON.stringify(body);
}
