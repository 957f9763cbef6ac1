function optionalEnv(key: string, defaultValue = ""): string {
  return process.env[key] ?? defaultValue;
}

function intEnv(key: string, defaultValue: number, min = Number.MIN_SAFE_INTEGER): number {
  const raw = process.env[key];
  if (raw === undefined || raw === "") return defaultValue;
  const val = parseInt(raw, 10);
  if (Number.isNaN(val)) throw new Error(`Environment variable ${key} must be an integer, got "${raw}"`);
  if (val < min) throw new Error(`Environment variable ${key} must be at least ${min}, got ${val}`);
  return val;
}

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface Config {
  readonly env: "development" | "staging" | "production" | "test";
  readonly port: number;
  readonly host: string;
  readonly logLevel: LogLevel;

  // Optional persistence (rate limiting uses Redis if available, falls back to memory)
  readonly redisUrl: string;

  // Rate limiting
  readonly rateLimitMax: number;
  readonly rateLimitWindowMs: number;

  /** Learning targets each generated sentence is biased toward */
  readonly targetSampleSize: number;
}

function parseEnvName(value: string): Config["env"] {
  switch (value) {
    case "production":
    case "staging":
    case "test":
      return value;
    default:
      return "development";
  }
}

function parseLogLevel(value: string, env: Config["env"]): LogLevel {
  if (!value) return env === "production" ? "info" : "debug";
  const level = LOG_LEVELS.find(l => l === value);
  if (!level) throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${value}"`);
  return level;
}

export function loadConfig(): Config {
  const env = parseEnvName(optionalEnv("NODE_ENV", "development"));

  return {
    env,
    port: intEnv("PORT", 3001, 0),
    host: optionalEnv("HOST", "0.0.0.0"),
    logLevel: parseLogLevel(optionalEnv("LOG_LEVEL"), env),

    redisUrl: optionalEnv("REDIS_URL", ""),   // optional, in-memory fallback

    rateLimitMax: intEnv("RATE_LIMIT_MAX", 100, 1),
    rateLimitWindowMs: intEnv("RATE_LIMIT_WINDOW_MS", 60000, 1),

    targetSampleSize: intEnv("TARGET_SAMPLE_SIZE", 2, 1),
  };
}

let _config: Config | null = null;

export function getConfig(): Config {
  if (!_config) throw new Error("Config not initialized. Call initConfig() first.");
  return _config;
}

export function initConfig(): Config {
  _config = loadConfig();
  return _config;
}
