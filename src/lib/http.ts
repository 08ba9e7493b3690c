/**
 * HTTP Response Helpers
 *
 * Utilities for sending JSON responses with proper caching headers and ETags.
 */

import { createHash } from "crypto";
import type { VercelRequest, VercelResponse } from "@vercel/node";
import { cfg } from "./env.js";

/**
 * Get CORS origin header value based on request origin
 * Supports multiple origins by checking if request origin is in allowed list
 */
function getCorsOrigin(requestOrigin?: string): string {
  const allowedOrigins = cfg.corsOrigins.split(",").map(o => o.trim());

  // Echo back an allowed origin so several origins can be configured
  if (requestOrigin && allowedOrigins.includes(requestOrigin)) {
    return requestOrigin;
  }

  // If wildcard is allowed, use it
  if (allowedOrigins.includes("*")) {
    return "*";
  }

  // Default to first allowed origin
  return allowedOrigins[0] ?? "*";
}


/**
 * Send JSON response with optional ETag and cache headers
 */
export function json<T>(
  res: VercelResponse,
  status: number,
  body: T,
  req: VercelRequest,
  etag?: string,
  cacheSeconds?: number
): VercelResponse {
  res.status(status);
  res.setHeader("Content-Type", "application/json");

  // CORS headers - restrict to allowed origins
  res.setHeader("Access-Control-Allow-Origin", getCorsOrigin(req.headers?.origin));
  res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type, If-None-Match, X-Api-Key");

  if (etag) {
    res.setHeader("ETag", etag);
  }

  if (cacheSeconds) {
    res.setHeader(
      "Cache-Control",
      `s-maxage=${cacheSeconds}, stale-while-revalidate=${cacheSeconds * 2}`
    );
  }

  return res.json(body);
}

/**
 * Send error response
 */
export function error(
  res: VercelResponse,
  status: number,
  message: string,
  req: VercelRequest,
  details?: unknown
): VercelResponse {
  const body: { error: string; details?: unknown } = { error: message };
  if (details !== undefined) {
    body.details = details;
  }
  return json(res, status, body, req);
}

/**
 * Handle CORS preflight OPTIONS requests
 */
export function handleCors(res: VercelResponse, req: VercelRequest): VercelResponse {
  res.setHeader("Access-Control-Allow-Origin", getCorsOrigin(req.headers?.origin));
  res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type, If-None-Match, X-Api-Key");
  res.setHeader("Access-Control-Max-Age", "86400"); // 24 hours
  return res.status(200).end();
}

/**
 * Weak ETag over the JSON body as served
 */
export function createEtag(body: unknown): string {
  const digest = createHash("sha1").update(JSON.stringify(body)).digest("hex");
  return `W/"${digest.slice(0, 16)}"`;
}

/**
 * Check If-None-Match header and return 304 if ETag matches
 * Returns true if 304 was sent, false otherwise
 */
export function handleNotModified(
  req: { headers: Record<string, string | string[] | undefined> },
  res: VercelResponse,
  etag: string
): boolean {
  if (req.headers["if-none-match"] === etag) {
    res.setHeader("ETag", etag);
    res.setHeader(
      "Cache-Control",
      `s-maxage=${cfg.cacheTtl}, stale-while-revalidate=${cfg.cacheTtl * 2}`
    );
    res.status(304).end();
    return true;
  }
  return false;
}
