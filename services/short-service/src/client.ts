import CircuitBreaker from "opossum";
import { RateLimiterMemory, RateLimiterRes } from "rate-limiter-flexible";
import { z } from "zod";
import { ShortServiceError, errorFromCode, isShortErrorCode } from "./errors.js";
import type { ShortService } from "./service.js";

export interface FetchInit {
  method: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
}

export type Fetcher = (url: string, init: FetchInit) => Promise<Response>;

export interface ClientRateLimit {
  /** requests allowed per window */
  points: number;
  /** window length in seconds */
  duration: number;
}

export interface HttpClientOptions {
  fetcher?: Fetcher;
  rateLimit?: ClientRateLimit;
  breaker?: CircuitBreaker.Options;
}

export class ClientRateLimitError extends Error {
  constructor(readonly retryAfterMs: number) {
    super(`client rate limit exceeded, retry in ${retryAfterMs}ms`);
    this.name = "ClientRateLimitError";
  }
}

const DEFAULT_RATE_LIMIT: ClientRateLimit = { points: 50, duration: 1 };

const DEFAULT_BREAKER: CircuitBreaker.Options = {
  timeout: 5_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000
};

const createReplySchema = z.object({ k: z.string() });
const lookupReplySchema = z.object({ v: z.string() });
const errorReplySchema = z.object({ error: z.string() });

async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Sends one request; error replies become typed errors where possible. */
async function send(fetcher: Fetcher, url: string, init: FetchInit): Promise<unknown> {
  const res = await fetcher(url, init);
  const body = await readJson(res);
  if (res.ok) return body;

  const parsed = errorReplySchema.safeParse(body);
  if (parsed.success && isShortErrorCode(parsed.data.error)) {
    throw errorFromCode(parsed.data.error);
  }
  const detail = parsed.success ? `: ${parsed.data.error}` : "";
  throw new Error(`request failed with status ${res.status}${detail}`);
}

function decode<T>(body: unknown, schema: z.ZodType<T>): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new Error(`unexpected response body: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** Domain answers from a healthy service do not count against the breaker. */
function isDomainError(err: unknown): boolean {
  return err instanceof ShortServiceError && err.code !== "internal_error";
}

/**
 * Returns a ShortService backed by a remote short-service instance.
 * `instance` is usually "host:port"; http:// is assumed when no scheme is given.
 *
 * Calls share one rate limiter, which fails fast instead of queueing, and one
 * circuit breaker.
 */
export function createHttpClient(instance: string, opts: HttpClientOptions = {}): ShortService {
  const base = new URL(instance.startsWith("http") ? instance : `http://${instance}`);
  const fetcher = opts.fetcher ?? fetch;

  const limiter = new RateLimiterMemory(opts.rateLimit ?? DEFAULT_RATE_LIMIT);
  const breaker = new CircuitBreaker((url: string, init: FetchInit) => send(fetcher, url, init), {
    ...DEFAULT_BREAKER,
    ...opts.breaker,
    errorFilter: isDomainError
  });

  const call = async (path: string, init: FetchInit): Promise<unknown> => {
    try {
      await limiter.consume(base.host);
    } catch (err) {
      if (err instanceof RateLimiterRes) throw new ClientRateLimitError(err.msBeforeNext);
      throw err;
    }
    return breaker.fire(new URL(path, base).toString(), init);
  };

  return {
    async create(value) {
      const body = await call("/api", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ v: value })
      });
      return decode(body, createReplySchema).k;
    },

    async lookup(key) {
      const body = await call(`/api/${encodeURIComponent(key)}`, { method: "GET" });
      return decode(body, lookupReplySchema).v;
    }
  };
}
