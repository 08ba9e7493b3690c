/**
 * Epoch API
 *
 * GET /api/epoch             current epoch summary with its pairs
 * GET /api/epoch?epoch={N}   summary as last published during epoch N
 */

import type { VercelRequest, VercelResponse } from "@vercel/node";
import { z } from "zod";
import { getJSON } from "../lib/kv.js";
import { createEtag, json, error, handleCors, handleNotModified } from "../lib/http.js";
import { kEpochHistoryJson, kEpochJson } from "../lib/keys.js";
import { cfg } from "../lib/env.js";
import { logRequest, errorLog } from "../lib/logger.js";
import { recordRequest } from "../lib/metrics.js";
import type { EpochDTO } from "../types/dto.js";

const QuerySchema = z.object({
  epoch: z.coerce.number().int().positive().optional(),
});

export default async function handler(req: VercelRequest, res: VercelResponse) {
  const start = Date.now();
  const done = (status: number) => {
    logRequest("GET", "/api/epoch", status, Date.now() - start);
    recordRequest("/api/epoch", status, Date.now() - start);
  };

  try {
    if (req.method === "OPTIONS") {
      return handleCors(res, req);
    }

    if (req.method !== "GET") {
      done(405);
      return error(res, 405, "Method not allowed", req);
    }

    const parsed = QuerySchema.safeParse(req.query);
    if (!parsed.success) {
      done(400);
      return error(res, 400, "Invalid query parameters", req, parsed.error.issues);
    }

    const { epoch } = parsed.data;
    const summary = await getJSON<EpochDTO>(epoch === undefined ? kEpochJson() : kEpochHistoryJson(epoch));
    if (!summary) {
      done(404);
      return error(res, 404, "Epoch not found", req);
    }

    const etag = createEtag(summary);
    if (handleNotModified(req, res, etag)) {
      done(304);
      return res;
    }

    done(200);
    return json(res, 200, summary, req, etag, cfg.cacheTtl);
  } catch (err) {
    errorLog("Epoch request failed", err);
    done(500);
    return error(res, 500, "Internal server error", req);
  }
}
