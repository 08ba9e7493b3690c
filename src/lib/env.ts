/**
 * Environment Configuration
 *
 * Validates and exports all environment variables.
 * Throws on missing required variables.
 */

function getEnv(key: string, required = true): string {
  const value = process.env[key];
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || "";
}

export const cfg = {
  // Redis (snapshot publication); empty disables publishing
  redisUrl: getEnv("REDIS_URL", false),

  // Cache
  cacheTtl: parseInt(getEnv("CACHE_TTL", false) || "30", 10),

  // Storage
  prefix: getEnv("STORAGE_PREFIX", false) || "arena:",

  // Metrics
  metricsApiKey: getEnv("METRICS_API_KEY", false) || "",

  // CORS
  corsOrigins: getEnv("CORS_ORIGINS", false) || "http://localhost:3000",
};

export { getEnv };
