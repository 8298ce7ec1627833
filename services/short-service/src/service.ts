import type { FastifyBaseLogger } from "fastify";
import { ShortServiceError } from "./errors.js";
import type { KeyStore } from "./key_store.js";

/** The operations every transport and client speaks. */
export interface ShortService {
  create(value: string): Promise<string>;
  lookup(key: string): Promise<string>;
}

export type ServiceMiddleware = (next: ShortService) => ShortService;

export type ServiceLogger = Pick<FastifyBaseLogger, "info" | "error">;

export class MemoryShortService implements ShortService {
  constructor(private readonly store: KeyStore) {}

  async create(value: string): Promise<string> {
    return this.store.create(value);
  }

  async lookup(key: string): Promise<string> {
    return this.store.lookup(key);
  }
}

function logFailure(logger: ServiceLogger, fields: Record<string, unknown>, err: unknown): void {
  if (err instanceof ShortServiceError && err.code !== "internal_error") {
    logger.info({ ...fields, err: err.code }, "short service call failed");
  } else {
    logger.error({ ...fields, err }, "short service call failed");
  }
}

export function loggingMiddleware(logger: ServiceLogger): ServiceMiddleware {
  return (next) => ({
    async create(value) {
      const fields = { method: "create", value_length: value.length };
      try {
        const key = await next.create(value);
        logger.info({ ...fields, key }, "short service call");
        return key;
      } catch (err) {
        logFailure(logger, fields, err);
        throw err;
      }
    },

    async lookup(key) {
      const fields = { method: "lookup", key };
      try {
        const value = await next.lookup(key);
        logger.info({ ...fields, value_length: value.length }, "short service call");
        return value;
      } catch (err) {
        logFailure(logger, fields, err);
        throw err;
      }
    }
  });
}

export function newMemoryService(deps: { store: KeyStore; logger: ServiceLogger }): ShortService {
  let svc: ShortService = new MemoryShortService(deps.store);
  svc = loggingMiddleware(deps.logger)(svc);
  return svc;
}
