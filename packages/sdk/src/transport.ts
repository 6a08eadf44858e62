/**
 * Authenticated JSON transport over fetch
 */

import { authorizationHeader, type Credentials } from "./credentials.js";
import { ApiError } from "./errors.js";
import { logger } from "./observability/logs.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  body?: unknown;
  query?: Record<string, QueryValue>;
}

export interface RestClient {
  readonly baseUrl: string;
  call(method: HttpMethod, path: string, options?: RequestOptions): Promise<unknown>;
}

export interface RestClientOptions {
  baseUrl: string;
  credentials: Credentials;
  fetchFn?: typeof fetch | undefined;
  /** Abort the request after this many milliseconds; 0 disables the timeout */
  timeoutMs?: number | undefined;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Join base URL and path, then append percent-encoded query parameters
 */
export function buildUrl(baseUrl: string, path: string, query?: Record<string, QueryValue>): string {
  const prefix = path.startsWith("/") ? path : `/${path}`;
  const url = new URL(`${baseUrl.replace(/\/+$/, "")}${prefix}`);
  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) {
        continue;
      }
      url.searchParams.append(key, String(value));
    }
  }
  return url.toString();
}

function parseBody(text: string): unknown {
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Create an immutable client bound to one base URL and one set of credentials
 */
export function createRestClient(options: RestClientOptions): RestClient {
  const baseUrl = options.baseUrl;
  const fetchFn = options.fetchFn ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const headers: Readonly<Record<string, string>> = Object.freeze({
    Authorization: authorizationHeader(options.credentials),
    "Content-Type": "application/json",
    Accept: "application/json",
  });

  async function call(method: HttpMethod, path: string, request?: RequestOptions): Promise<unknown> {
    const uri = buildUrl(baseUrl, path, request?.query);
    const body =
      request?.body === undefined || request.body === null ? undefined : JSON.stringify(request.body);

    const controller = new AbortController();
    const timeout = timeoutMs > 0 ? setTimeout(() => controller.abort(), timeoutMs) : undefined;
    const start = Date.now();

    logger.debug("http.request", { method, uri });

    const exchange = async (): Promise<{ response: Response; text: string }> => {
      try {
        const response = await fetchFn(uri, {
          method,
          headers: { ...headers },
          ...(body !== undefined ? { body } : {}),
          signal: controller.signal,
        });
        return { response, text: await response.text() };
      } catch (error) {
        const reason = controller.signal.aborted
          ? `timed out after ${timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
        logger.error("http.error", { method, uri, err_message: reason });
        throw new ApiError({ method, uri, reason }, { cause: error });
      } finally {
        clearTimeout(timeout);
      }
    };

    const { response, text } = await exchange();
    const duration_ms = Date.now() - start;

    if (!response.ok) {
      logger.error("http.error", {
        method,
        uri,
        status: response.status,
        duration_ms,
        raw_body: text,
      });
      throw new ApiError({
        method,
        uri,
        statusCode: response.status,
        ...(text ? { rawBody: text } : {}),
      });
    }

    logger.debug("http.response", { method, uri, status: response.status, duration_ms });
    return parseBody(text);
  }

  return Object.freeze({ baseUrl, call });
}

/**
 * Percent-encode a value used as a single path segment
 */
export function encodeSegment(value: string): string {
  return encodeURIComponent(value);
}
