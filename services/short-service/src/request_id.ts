import type { IncomingHttpHeaders } from "http";
import { randomUUID } from "crypto";

export const REQUEST_ID_HEADER = "x-request-id";

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Get incoming X-Request-Id if present, otherwise generate a new one.
 * Trim it, enforce a sane length, and avoid empty values.
 */
export function getOrCreateRequestId(headers: IncomingHttpHeaders): string {
  const raw = headers[REQUEST_ID_HEADER];
  const incoming = Array.isArray(raw) ? raw[0] : raw;

  const trimmed = (incoming ?? "").trim();
  if (trimmed.length > 0 && trimmed.length <= MAX_REQUEST_ID_LENGTH) {
    return trimmed;
  }

  return randomUUID();
}
