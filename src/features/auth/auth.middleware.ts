import type { FastifyRequest } from "fastify";
import { env } from "@/config/env.js";
import { HttpError } from "@/shared/http-errors.js";
import { addressPattern, asAddress } from "@/shared/viem.js";
import type { AuthContext } from "@/features/auth/auth.types.js";

type RateWindow = { windowStartMs: number; count: number; lastSeenMs: number };
const rateWindows = new Map<string, RateWindow>();

function pruneRateWindows(nowMs: number) {
  for (const [key, value] of rateWindows.entries()) {
    if (nowMs - value.lastSeenMs > 10 * 60_000) rateWindows.delete(key);
  }
}

function enforceRateLimit(caller: string, nowMs: number) {
  pruneRateWindows(nowMs);

  const windowMs = 60_000;
  const limitPerMinute = 600;

  const existing = rateWindows.get(caller);
  if (!existing || nowMs - existing.windowStartMs >= windowMs) {
    rateWindows.set(caller, { windowStartMs: nowMs, count: 1, lastSeenMs: nowMs });
    return;
  }

  existing.count += 1;
  existing.lastSeenMs = nowMs;

  if (existing.count > limitPerMinute) {
    const retryAfterSeconds = Math.max(1, Math.ceil((existing.windowStartMs + windowMs - nowMs) / 1000));
    throw new HttpError(429, "rate-limited", `Too many requests. Retry after ${retryAfterSeconds}s`);
  }
}

export async function requireCallerAuth(request: FastifyRequest) {
  const apiKey = request.headers["x-api-key"];
  if (typeof apiKey !== "string" || apiKey.length === 0) {
    throw new HttpError(401, "missing-api-key", "Missing X-Api-Key header");
  }
  if (apiKey !== env.API_AUTH_TOKEN) {
    throw new HttpError(401, "invalid-api-key", "Invalid X-Api-Key header");
  }

  const callerHeader = request.headers["x-caller-address"];
  if (typeof callerHeader !== "string" || !addressPattern.test(callerHeader)) {
    throw new HttpError(401, "missing-caller", "X-Caller-Address must be a 0x-prefixed 20-byte address");
  }

  const caller = asAddress(callerHeader);
  enforceRateLimit(caller, Date.now());
  request.auth = { caller };
}

export function getAuth(request: FastifyRequest): AuthContext {
  if (!request.auth) throw new HttpError(401, "unauthenticated", "Route requires caller authentication");
  return request.auth;
}
