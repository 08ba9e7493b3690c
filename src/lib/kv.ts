/**
 * Snapshot Store (Redis)
 *
 * One lazily connected client per process. Publishing is optional: with
 * REDIS_URL unset the store is disabled and every call to the client fails
 * with KvDisabledError.
 */

import { createClient } from "redis";
import { cfg } from "./env.js";
import { errorLog } from "./logger.js";
import { PING_INTERVAL_MS } from "./constants.js";

type RedisClient = ReturnType<typeof createClient>;
export type KvPipeline = ReturnType<RedisClient["multi"]>;

export class KvDisabledError extends Error {
  constructor() {
    super("KV is disabled: REDIS_URL is not set");
    this.name = "KvDisabledError";
  }
}

let client: RedisClient | null = null;
let connecting: Promise<RedisClient> | null = null;
let lastHealthyAt = 0;

export function isKvEnabled(): boolean {
  return cfg.redisUrl !== "";
}

function forget(): void {
  client = null;
  connecting = null;
  lastHealthyAt = 0;
}

/**
 * The open client, pinged at most once per PING_INTERVAL_MS; null when it has to be replaced
 */
async function openClient(): Promise<RedisClient | null> {
  const current = client;
  if (!current?.isOpen) return null;

  const now = Date.now();
  if (now - lastHealthyAt <= PING_INTERVAL_MS) return current;

  try {
    await current.ping();
    lastHealthyAt = now;
    return current;
  } catch (err) {
    errorLog("Redis ping failed, reconnecting", err);
    forget();
    await current.quit().catch((quitErr: unknown) => {
      errorLog("Failed to close stale Redis connection", quitErr);
    });
    return null;
  }
}

function connect(): Promise<RedisClient> {
  const next = createClient({ url: cfg.redisUrl });
  next.on("error", (err) => errorLog("Redis Client Error", err));
  next.on("end", forget);
  client = next;

  connecting = next
    .connect()
    .then(() => {
      lastHealthyAt = Date.now();
      connecting = null;
      return next;
    })
    .catch((err: unknown) => {
      forget();
      throw err;
    });
  return connecting;
}

async function getClient(): Promise<RedisClient> {
  if (!isKvEnabled()) {
    throw new KvDisabledError();
  }
  const open = await openClient();
  if (open) return open;
  return connecting ?? connect();
}

export const kv = { getClient };

/**
 * Run the queued commands in one MULTI/EXEC round-trip
 *
 * @example
 * await pipeline((pipe) => {
 *   pipe.set(prefixKey(kEpochJson()), body);
 *   pipe.set(prefixKey(kStakerJson(1)), staker);
 * });
 */
export async function pipeline(callback: (pipe: KvPipeline) => void): Promise<unknown[]> {
  const multi = (await getClient()).multi();
  callback(multi);
  return multi.exec();
}

export function prefixKey(key: string): string {
  return `${cfg.prefix}${key}`;
}

/**
 * Read a JSON document; unparsable values read as missing
 */
export async function getJSON<T>(key: string): Promise<T | null> {
  const redis = await getClient();
  const prefixed = prefixKey(key);
  const value = await redis.get(prefixed);
  if (!value) return null;
  try {
    return JSON.parse(value) as T;
  } catch (err) {
    errorLog(`Failed to parse JSON for key ${prefixed}`, err);
    return null;
  }
}
