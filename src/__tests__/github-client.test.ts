import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  createGitHubClient,
  injectRateLimit,
  isTransientError,
  retryAfterMs,
} from "../github-client.js";
import { CancelledError, TransportError } from "../lib/errors.js";

const { graphqlMock, defaultsMock } = vi.hoisted(() => {
  const graphqlMock = vi.fn();
  const defaultsMock = vi.fn(() => graphqlMock);
  return { graphqlMock, defaultsMock };
});

// Mock @octokit/graphql to avoid real API calls
vi.mock("@octokit/graphql", () => ({
  graphql: Object.assign(vi.fn(), { defaults: defaultsMock }),
}));

const CREDENTIALS = { token: "test-secret", source: "GHX_TOKEN" };

function httpError(message: string, status: number, headers: Record<string, string> = {}) {
  return Object.assign(new Error(message), { status, response: { headers } });
}

function setup() {
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const warnings: string[] = [];
  const client = createGitHubClient(CREDENTIALS, {
    retry: { maxRetries: 3, baseDelayMs: 500 },
    sleep,
    warn: (message) => warnings.push(message),
  });
  return { client, sleep, warnings };
}

beforeEach(() => {
  graphqlMock.mockReset();
  defaultsMock.mockClear();
});

describe("createGitHubClient", () => {
  it("authenticates with the given token", () => {
    setup();

    expect(defaultsMock).toHaveBeenCalledWith({
      headers: { authorization: "token test-secret" },
    });
  });

  it("passes a custom base URL", () => {
    createGitHubClient(CREDENTIALS, { baseUrl: "https://ghe.example.com/api" });

    expect(defaultsMock).toHaveBeenCalledWith({
      baseUrl: "https://ghe.example.com/api",
      headers: { authorization: "token test-secret" },
    });
  });

  it("adds rateLimit to queries and tracks it", async () => {
    const { client } = setup();
    graphqlMock.mockResolvedValueOnce({
      viewer: { login: "octocat" },
      rateLimit: { limit: 5000, remaining: 42, resetAt: "2026-01-01T00:00:00Z", cost: 1 },
    });

    await client.query("query Who { viewer { login } }");

    expect(String(graphqlMock.mock.calls[0]?.[0])).toContain("rateLimit");
    expect(client.getRateLimitStatus()).toEqual({
      remaining: 42,
      resetAt: new Date("2026-01-01T00:00:00Z"),
      isLow: true,
      isCritical: true,
    });
  });

  it("retries transient query failures with exponential backoff", async () => {
    const { client, sleep, warnings } = setup();
    graphqlMock
      .mockRejectedValueOnce(new Error("read ECONNRESET"))
      .mockRejectedValueOnce(httpError("Bad gateway", 502))
      .mockResolvedValueOnce({ ok: true });

    const result = await client.query<{ ok: boolean }>("query Thing { ok }");

    expect(result.ok).toBe(true);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 1000]);
    expect(warnings[0]).toBe(
      "[ghx] Thing failed (read ECONNRESET). Retrying in 1s (attempt 1 of 3).",
    );
  });

  it("gives up after the configured retries", async () => {
    const { client, sleep } = setup();
    graphqlMock.mockRejectedValue(new Error("socket hang up"));

    const error = await client.query("query Thing { ok }").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error instanceof TransportError && error.message).toBe("Thing failed: socket hang up");
    expect(graphqlMock).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 1000, 2000]);
  });

  it("does not retry a query rejected for a client error", async () => {
    const { client } = setup();
    graphqlMock.mockRejectedValueOnce(httpError("Bad credentials", 401));

    const error = await client.query("query Thing { ok }").catch((e: unknown) => e);

    expect(error instanceof TransportError && error.status).toBe(401);
    expect(graphqlMock).toHaveBeenCalledTimes(1);
  });

  it("does not retry a mutation on a transient failure", async () => {
    const { client, sleep } = setup();
    graphqlMock.mockRejectedValueOnce(new Error("read ECONNRESET"));

    await expect(client.mutate("mutation Change { ok }")).rejects.toThrow(
      "Change failed: read ECONNRESET",
    );
    expect(graphqlMock).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries a mutation GitHub asked to retry later", async () => {
    const { client, sleep } = setup();
    graphqlMock
      .mockRejectedValueOnce(httpError("secondary rate limit", 403, { "retry-after": "2" }))
      .mockResolvedValueOnce({ ok: true });

    await client.mutate("mutation Change { ok }");

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000]);
    expect(String(graphqlMock.mock.calls[0]?.[0])).not.toContain("rateLimit");
  });

  it("does not send a request once cancelled", async () => {
    const { client } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      client.query("query Thing { ok }", undefined, { signal: controller.signal }),
    ).rejects.toThrow(CancelledError);
    expect(graphqlMock).not.toHaveBeenCalled();
  });

  it("turns an abort during backoff into CancelledError", async () => {
    const controller = new AbortController();
    const client = createGitHubClient(CREDENTIALS, {
      retry: { maxRetries: 3, baseDelayMs: 500 },
      warn: () => {},
      sleep: async () => {
        controller.abort();
        throw new Error("aborted");
      },
    });
    graphqlMock.mockRejectedValueOnce(new Error("ETIMEDOUT"));

    await expect(
      client.query("query Thing { ok }", undefined, { signal: controller.signal }),
    ).rejects.toThrow("Thing cancelled");
  });

  it("caches the authenticated user", async () => {
    const { client } = setup();
    graphqlMock.mockResolvedValue({ viewer: { login: "octocat" } });

    expect(await client.getAuthenticatedUser()).toBe("octocat");
    expect(await client.getAuthenticatedUser()).toBe("octocat");
    expect(graphqlMock).toHaveBeenCalledTimes(1);
  });
});

describe("injectRateLimit", () => {
  it("inserts the selection after the operation's opening brace", () => {
    const result = injectRateLimit("query Q($id: ID!) { node(id: $id) { id } }");

    expect(result.startsWith("query Q($id: ID!) {\n  \n  rateLimit {")).toBe(true);
    expect(result.endsWith(" node(id: $id) { id } }")).toBe(true);
  });

  it("leaves mutations and documents that already select rateLimit alone", () => {
    expect(injectRateLimit("mutation M { x }")).toBe("mutation M { x }");
    expect(injectRateLimit("query Q { rateLimit { cost } }")).toBe("query Q { rateLimit { cost } }");
  });
});

describe("error classification", () => {
  it("treats 5xx, 429 and network failures as transient", () => {
    expect(isTransientError(httpError("x", 503))).toBe(true);
    expect(isTransientError(httpError("x", 429))).toBe(true);
    expect(isTransientError(new Error("fetch failed", { cause: new Error("ECONNREFUSED") }))).toBe(true);
    expect(isTransientError(httpError("x", 404))).toBe(false);
    expect(isTransientError(new Error("Field 'x' doesn't exist"))).toBe(false);
  });

  it("reads retry-after only from 403 and 429 responses", () => {
    expect(retryAfterMs(httpError("x", 429, { "retry-after": "7" }))).toBe(7000);
    expect(retryAfterMs(httpError("x", 500, { "retry-after": "7" }))).toBeUndefined();
    expect(retryAfterMs(httpError("x", 403))).toBeUndefined();
  });
});
