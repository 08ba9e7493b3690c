/**
 * Positions API
 *
 * GET /api/positions?kind=staking|voting&id={N}
 */

import type { VercelRequest, VercelResponse } from "@vercel/node";
import { z } from "zod";
import { getJSON } from "../lib/kv.js";
import { createEtag, json, error, handleCors, handleNotModified } from "../lib/http.js";
import { kStakerJson, kVotingJson } from "../lib/keys.js";
import { cfg } from "../lib/env.js";
import { logRequest, errorLog } from "../lib/logger.js";
import { recordRequest } from "../lib/metrics.js";
import { positionIdSchema } from "../lib/validation.js";
import type { StakerPositionDTO, VotingPositionDTO } from "../types/dto.js";

const QuerySchema = z.object({
  kind: z.enum(["staking", "voting"]),
  id: positionIdSchema,
});

export default async function handler(req: VercelRequest, res: VercelResponse) {
  const start = Date.now();
  const done = (status: number) => {
    logRequest("GET", "/api/positions", status, Date.now() - start);
    recordRequest("/api/positions", status, Date.now() - start);
  };

  try {
    if (req.method === "OPTIONS") {
      return handleCors(res, req);
    }

    if (req.method !== "GET") {
      done(405);
      return error(res, 405, "Method not allowed", req);
    }

    // Validate query params
    const parsed = QuerySchema.safeParse(req.query);
    if (!parsed.success) {
      done(400);
      return error(res, 400, "Invalid query parameters", req, parsed.error.issues);
    }

    const { kind, id } = parsed.data;
    const position =
      kind === "staking"
        ? await getJSON<StakerPositionDTO>(kStakerJson(id))
        : await getJSON<VotingPositionDTO>(kVotingJson(id));

    if (!position) {
      done(404);
      return error(res, 404, "Position not found", req, { kind, id });
    }

    const body = { kind, position };
    const etag = createEtag(body);

    // Handle 304 Not Modified
    if (handleNotModified(req, res, etag)) {
      done(304);
      return res;
    }

    done(200);
    return json(res, 200, body, req, etag, cfg.cacheTtl);
  } catch (err) {
    errorLog("Positions request failed", err);
    done(500);
    return error(res, 500, "Internal server error", req);
  }
}
