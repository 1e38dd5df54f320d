export interface AppConfig {
  port: number;
  host: string;
  controlAuthToken: string;
  identityTokenSecret: string;
  identityTokenTtlSec: number;
  throttleMaxAttempts: number;
  throttleWindowSec: number;
  throttleKeyPrefix: string;
  cacheSweepIntervalSec: number;
}

function required(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required env var ${name}`);
  }
  return value;
}

function numberEnv(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: ${value}`);
  }
  return parsed;
}

function positiveNumberEnv(name: string, fallback: number): number {
  const parsed = numberEnv(name, fallback);
  if (parsed <= 0) {
    throw new Error(`Env var ${name} must be positive: ${parsed}`);
  }
  return parsed;
}

function countEnv(name: string, fallback: number): number {
  const parsed = numberEnv(name, fallback);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Env var ${name} must be a non-negative integer: ${parsed}`);
  }
  return parsed;
}

export function loadConfig(): AppConfig {
  return {
    port: numberEnv("PORT", 8080),
    host: process.env.HOST ?? "0.0.0.0",
    controlAuthToken: required("CONTROL_AUTH_TOKEN"),
    identityTokenSecret: required("IDENTITY_TOKEN_SECRET"),
    identityTokenTtlSec: numberEnv("IDENTITY_TOKEN_TTL_SEC", 900),
    throttleMaxAttempts: countEnv("THROTTLE_MAX_ATTEMPTS", 5),
    throttleWindowSec: positiveNumberEnv("THROTTLE_WINDOW_SEC", 60),
    throttleKeyPrefix: process.env.THROTTLE_KEY_PREFIX ?? "throttle:",
    cacheSweepIntervalSec: positiveNumberEnv("CACHE_SWEEP_INTERVAL_SEC", 30),
  };
}
