/**
 * Rate Limiting Middleware
 *
 * A search costs one postcode lookup plus one Journey Planner call per airport.
 *
 * Tiers:
 * - Search: SEARCH_RATE_LIMIT_PER_MINUTE per IP (default 30)
 * - Everything else under /api: 100/min per IP
 */

import rateLimit from "express-rate-limit";
import type { Request } from "express";
import { config } from "../config";

// ============================================================================
// RATE LIMITERS
// ============================================================================

export const searchRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: config.SEARCH_RATE_LIMIT_PER_MINUTE,
  message: {
    error: "Too many searches. Please wait a minute before trying again.",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

export const generalRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 100,
  message: {
    error: "Too many requests. Please slow down.",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Get client IP address, handling proxies
 */
export function getClientIP(req: Request): string {
  // Trust X-Forwarded-For from reverse proxies
  const forwarded = req.headers["x-forwarded-for"];
  if (forwarded) {
    const ips = typeof forwarded === "string" ? forwarded : forwarded[0];
    return ips.split(",")[0].trim();
  }

  return req.ip || req.socket.remoteAddress || "unknown";
}
