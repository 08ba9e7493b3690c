/**
 * Health Check Endpoint
 *
 * GET /api/health
 */

import type { VercelRequest, VercelResponse } from "@vercel/node";
import { kv, getJSON } from "../lib/kv.js";
import { json, error, handleCors } from "../lib/http.js";
import { logRequest, errorLog } from "../lib/logger.js";
import { recordRequest } from "../lib/metrics.js";
import { kEpochJson } from "../lib/keys.js";
import type { EpochDTO } from "../types/dto.js";

export default async function handler(req: VercelRequest, res: VercelResponse) {
  const start = Date.now();

  try {
    // Handle CORS preflight
    if (req.method === "OPTIONS") {
      return handleCors(res, req);
    }

    if (req.method !== "GET") {
      return error(res, 405, "Method not allowed", req);
    }

    const details: Record<string, unknown> = {};
    const health = {
      ok: true,
      services: {
        kv: false,
        snapshot: false,
      },
      details,
      timestamp: new Date().toISOString(),
    };

    // Test KV connectivity with read-only PING
    try {
      const client = await kv.getClient();
      await client.ping();
      health.services.kv = true;
    } catch (err) {
      errorLog("Health check: KV failed", err);
      health.details.kvError = err instanceof Error ? err.message : "Unknown error";
    }

    // A published epoch summary means the arena publisher is running
    if (health.services.kv) {
      try {
        const epoch = await getJSON<EpochDTO>(kEpochJson());
        if (epoch) {
          health.services.snapshot = true;
          health.details.epoch = epoch.epoch;
          health.details.snapshotUpdatedAt = epoch.updatedAt;
        } else {
          health.details.snapshotError = "No arena snapshot published";
        }
      } catch (err) {
        errorLog("Health check: snapshot read failed", err);
        health.details.snapshotError = err instanceof Error ? err.message : "Unknown error";
      }
    }

    // Overall health is OK only if all services are healthy
    health.ok = Object.values(health.services).every(s => s);

    const duration = Date.now() - start;
    const status = health.ok ? 200 : 503;
    logRequest("GET", "/api/health", status, duration);
    recordRequest("/api/health", status, duration);

    return json(res, status, health, req);
  } catch (err) {
    const duration = Date.now() - start;
    errorLog("Health check failed", err);
    logRequest("GET", "/api/health", 500, duration);
    recordRequest("/api/health", 500, duration);

    return json(res, 500, {
      ok: false,
      services: { kv: false, snapshot: false },
    }, req);
  }
}
