/**
 * GitHub GraphQL client with explicit credentials, rate limiting,
 * bounded retry and cancellation.
 *
 * Wraps @octokit/graphql. All queries automatically include the
 * rateLimit fragment for continuous tracking. Queries are retried on
 * transient failures; mutations only when GitHub turned them away for
 * rate limiting, since a mutation that reached the server may have
 * been applied.
 */

import { graphql } from "@octokit/graphql";
import { RateLimiter, sleep } from "./lib/rate-limiter.js";
import type { DebugLogger } from "./lib/debug-logger.js";
import { extractOperationName, sanitize } from "./lib/debug-logger.js";
import type { Credentials, RetryConfig } from "./lib/config.js";
import {
  CancelledError,
  TransportError,
  errorMessage,
} from "./lib/errors.js";
import type { RateLimitInfo } from "./types.js";

/**
 * The rateLimit fragment to include in every query for proactive tracking.
 */
const RATE_LIMIT_FRAGMENT = `
  rateLimit {
    limit
    remaining
    resetAt
    cost
    nodeCount
  }
`;

const TRANSIENT_ERROR_PATTERN =
  /ECONNRESET|ETIMEDOUT|ECONNREFUSED|EAI_AGAIN|socket hang up|fetch failed|network/i;

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface GitHubClient {
  /** Execute a GraphQL query. Retried on transient failures. */
  query: <T = unknown>(
    queryString: string,
    variables?: Record<string, unknown>,
    options?: RequestOptions,
  ) => Promise<T>;

  /** Execute a GraphQL mutation. Retried only on rate-limit rejections. */
  mutate: <T = unknown>(
    mutation: string,
    variables?: Record<string, unknown>,
    options?: RequestOptions,
  ) => Promise<T>;

  /** Get rate limit status. */
  getRateLimitStatus: () => {
    remaining: number;
    resetAt: Date;
    isLow: boolean;
    isCritical: boolean;
  };

  /** Get the authenticated user's login. */
  getAuthenticatedUser: (options?: RequestOptions) => Promise<string>;
}

export interface GitHubClientOptions {
  retry?: RetryConfig;
  debugLogger?: DebugLogger | null;
  baseUrl?: string;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  warn?: (message: string) => void;
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

export function errorStatus(error: unknown): number | undefined {
  if (
    error &&
    typeof error === "object" &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return error.status;
  }
  return undefined;
}

function headerValue(headers: unknown, name: string): string | undefined {
  if (headers && typeof headers === "object" && name in headers) {
    const value: unknown = Reflect.get(headers, name);
    return typeof value === "string" || typeof value === "number"
      ? String(value)
      : undefined;
  }
  return undefined;
}

/**
 * Milliseconds GitHub asked us to wait, for 403/429 rejections that
 * carry a retry-after header.
 */
export function retryAfterMs(error: unknown): number | undefined {
  const status = errorStatus(error);
  if (status !== 403 && status !== 429) return undefined;
  if (!error || typeof error !== "object") return undefined;

  const direct = "headers" in error ? headerValue(error.headers, "retry-after") : undefined;
  const nested =
    "response" in error && error.response && typeof error.response === "object" && "headers" in error.response
      ? headerValue(error.response.headers, "retry-after")
      : undefined;
  const retryAfter = direct ?? nested;
  if (retryAfter === undefined) return undefined;

  const seconds = Number.parseInt(retryAfter, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

export function isTransientError(error: unknown): boolean {
  const status = errorStatus(error);
  if (status !== undefined) {
    return status >= 500 || status === 429;
  }
  const cause =
    error instanceof Error && error.cause !== undefined
      ? errorMessage(error.cause)
      : "";
  return TRANSIENT_ERROR_PATTERN.test(`${errorMessage(error)} ${cause}`);
}

function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Insert the rateLimit selection into a query's top-level selection set.
 * Mutations and documents that already select rateLimit are unchanged.
 */
export function injectRateLimit(queryString: string): string {
  if (/^\s*mutation\b/i.test(queryString) || queryString.includes("rateLimit")) {
    return queryString;
  }
  const match = /\bquery\b\s*\w*\s*(\([^)]*\))?\s*\{/.exec(queryString);
  if (!match) return queryString;

  const insertPos = match.index + match[0].length;
  return (
    queryString.slice(0, insertPos) +
    "\n  " +
    RATE_LIMIT_FRAGMENT +
    queryString.slice(insertPos)
  );
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

/**
 * Create an authenticated GitHub GraphQL client.
 */
export function createGitHubClient(
  credentials: Credentials,
  options: GitHubClientOptions = {},
): GitHubClient {
  const graphqlWithAuth = graphql.defaults({
    ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
    headers: {
      authorization: `token ${credentials.token}`,
    },
  });

  const retry = options.retry ?? { maxRetries: 3, baseDelayMs: 500 };
  const sleepFn = options.sleep ?? sleep;
  const warn = options.warn ?? ((message: string) => console.error(message));
  const debugLogger = options.debugLogger ?? null;
  const rateLimiter = new RateLimiter({ sleep: sleepFn, warn });
  let viewerLogin: string | undefined;

  async function wait(ms: number, operation: string, signal?: AbortSignal) {
    try {
      await sleepFn(ms, signal);
    } catch (error) {
      if (isAbortError(error, signal)) {
        throw new CancelledError(`${operation} cancelled`);
      }
      throw error;
    }
  }

  /**
   * Execute a raw GraphQL request with rate limit tracking and retry.
   */
  async function executeGraphQL<T>(
    queryString: string,
    variables: Record<string, unknown> | undefined,
    isMutation: boolean,
    signal: AbortSignal | undefined,
  ): Promise<T> {
    const fullQuery = isMutation ? queryString : injectRateLimit(queryString);
    const operation =
      extractOperationName(queryString) ?? (isMutation ? "mutation" : "query");

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        throw new CancelledError(`${operation} cancelled`);
      }
      try {
        await rateLimiter.checkBeforeRequest(signal);
      } catch (error) {
        if (isAbortError(error, signal)) {
          throw new CancelledError(`${operation} cancelled`);
        }
        throw error;
      }

      const t0 = Date.now();
      try {
        const response = await graphqlWithAuth<T & { rateLimit?: RateLimitInfo }>(
          fullQuery,
          {
            ...(variables ?? {}),
            ...(signal ? { request: { signal } } : {}),
          },
        );

        if (response.rateLimit) {
          rateLimiter.update(response.rateLimit);
        }

        debugLogger?.logGraphQL({
          operation,
          variables: sanitize(variables),
          durationMs: Date.now() - t0,
          status: 200,
          attempt,
          rateLimitRemaining: response.rateLimit?.remaining,
          rateLimitCost: response.rateLimit?.cost,
        });

        return response;
      } catch (error: unknown) {
        const status = errorStatus(error);
        debugLogger?.logGraphQL({
          operation,
          variables: sanitize(variables),
          durationMs: Date.now() - t0,
          status: status ?? 500,
          attempt,
          error: errorMessage(error),
        });

        if (isAbortError(error, signal)) {
          throw new CancelledError(`${operation} cancelled`);
        }

        const rateLimitWait = retryAfterMs(error);
        const retryable =
          rateLimitWait !== undefined || (!isMutation && isTransientError(error));

        if (retryable && attempt < retry.maxRetries) {
          const waitMs = rateLimitWait ?? retry.baseDelayMs * 2 ** attempt;
          warn(
            `[ghx] ${operation} failed (${errorMessage(error)}). ` +
              `Retrying in ${Math.ceil(waitMs / 1000)}s (attempt ${attempt + 1} of ${retry.maxRetries}).`,
          );
          await wait(waitMs, operation, signal);
          continue;
        }

        throw new TransportError(operation, error, status);
      }
    }
  }

  return {
    query<T>(
      queryString: string,
      variables?: Record<string, unknown>,
      requestOptions?: RequestOptions,
    ): Promise<T> {
      return executeGraphQL<T>(queryString, variables, false, requestOptions?.signal);
    },

    mutate<T>(
      mutation: string,
      variables?: Record<string, unknown>,
      requestOptions?: RequestOptions,
    ): Promise<T> {
      return executeGraphQL<T>(mutation, variables, true, requestOptions?.signal);
    },

    getRateLimitStatus() {
      return rateLimiter.getStatus();
    },

    async getAuthenticatedUser(requestOptions?: RequestOptions): Promise<string> {
      if (viewerLogin) return viewerLogin;

      const result = await executeGraphQL<{ viewer: { login: string } }>(
        `query Viewer { viewer { login } }`,
        undefined,
        false,
        requestOptions?.signal,
      );

      viewerLogin = result.viewer.login;
      return viewerLogin;
    },
  };
}
