import { z } from "zod";
import type { GlossOptions } from "@glossa/gloss";

const EnvSchema = z.enum(["development", "test", "staging", "production"]);
const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

function optionalEnv(key: string, defaultValue = ""): string {
  return process.env[key] ?? defaultValue;
}

function intEnv(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === "") return defaultValue;
  const val = parseInt(raw, 10);
  if (Number.isNaN(val)) throw new Error(`Environment variable ${key} must be an integer, got "${raw}"`);
  return val;
}

/** "true"/"false" (any case), or undefined when unset so the library default applies */
function booleanEnv(key: string): boolean | undefined {
  const raw = process.env[key];
  if (raw === undefined || raw === "") return undefined;
  const lower = raw.toLowerCase();
  if (lower === "true") return true;
  if (lower === "false") return false;
  throw new Error(`Environment variable ${key} must be "true" or "false", got "${raw}"`);
}

export interface Config {
  readonly env: z.infer<typeof EnvSchema>;
  readonly port: number;
  readonly host: string;
  readonly logLevel: z.infer<typeof LogLevelSchema>;
  readonly bodyLimitBytes: number;
  /** Longest line accepted in gloss text or template source */
  readonly maxLineLength: number;

  // Optional rate-limit store (falls back to memory)
  readonly redisUrl: string;

  // Rate limiting
  readonly rateLimitMax: number;
  readonly rateLimitWindowMs: number;

  /** Service-wide gloss defaults; request options are merged over these */
  readonly glossDefaults: GlossOptions;
}

export function loadConfig(): Config {
  const env = EnvSchema.parse(optionalEnv("NODE_ENV", "development"));

  return {
    env,
    port: intEnv("PORT", 3001),
    host: optionalEnv("HOST", "0.0.0.0"),
    logLevel: LogLevelSchema.parse(optionalEnv("LOG_LEVEL", env === "production" ? "info" : "debug")),
    bodyLimitBytes: intEnv("BODY_LIMIT_BYTES", 256 * 1024),
    maxLineLength: intEnv("MAX_LINE_LENGTH", 2000),

    redisUrl: optionalEnv("REDIS_URL", ""),   // optional — in-memory fallback

    rateLimitMax: intEnv("RATE_LIMIT_MAX", 100),
    rateLimitWindowMs: intEnv("RATE_LIMIT_WINDOW_MS", 60_000),

    glossDefaults: {
      firstLineOrig: booleanEnv("GLOSS_FIRST_LINE_ORIG"),
      lastLineFree: booleanEnv("GLOSS_LAST_LINE_FREE"),
      spacing: booleanEnv("GLOSS_SPACING"),
      autoTag: booleanEnv("GLOSS_AUTO_TAG"),
    },
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
