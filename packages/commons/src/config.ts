import z from "zod";
import { DEFAULT_STATE_DIR, stateFilePath } from "./constants.js";

export const APP_KEYS = ["sonarr", "radarr", "lidarr"] as const;
export type AppKey = (typeof APP_KEYS)[number];
export const AppKeySchema = z.enum(APP_KEYS);

export const SEARCH_MODES = ["missing", "upgrades"] as const;
export type SearchMode = (typeof SEARCH_MODES)[number];

export type ArrAppConfig = {
  enabled: boolean;
  url: string;
  apiKey: string;
  missingLimit: number;
  upgradesLimit: number;
  promoteLimit: number;
  cooldownSeconds: Record<SearchMode, number>;
};

export type AppConfig = {
  logLevel: string;
  randomSeed?: string;
  tagSearch: string;
  tagDone: string;
  runIntervalMinutes: number;
  wantedPageSize: number;
  httpTimeoutSeconds: number;
  dryRun: boolean;
  stateDir: string;
  statePath: string;
  autoPromote: boolean;
  redisUrl?: string;
  apps: Record<AppKey, ArrAppConfig>;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

/* --- Scalar parsers --- */

const TRUTHY = new Set(["1", "true", "yes", "y", "on"]);

const IntLiteral = z.string().trim().regex(/^[+-]?\d+$/).transform(Number);
const FloatLiteral = z
  .string()
  .trim()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/)
  .transform(Number);

function isBlank(v: string | undefined): boolean {
  return v === undefined || v.trim() === "";
}

export function envBool(env: Env, name: string, fallback: boolean): boolean {
  const v = env[name];
  if (v === undefined) return fallback;
  return TRUTHY.has(v.trim().toLowerCase());
}

export function envInt(env: Env, name: string, fallback: number): number {
  const v = env[name];
  if (isBlank(v)) return fallback;
  const parsed = IntLiteral.safeParse(v);
  if (!parsed.success) throw new ConfigError(`Env var ${name} must be an integer, got: ${JSON.stringify(v)}`);
  return parsed.data;
}

export function envFloat(env: Env, name: string, fallback: number): number {
  const v = env[name];
  if (isBlank(v)) return fallback;
  const parsed = FloatLiteral.safeParse(v);
  if (!parsed.success) throw new ConfigError(`Env var ${name} must be a number, got: ${JSON.stringify(v)}`);
  return parsed.data;
}

export function envString(env: Env, name: string, fallback: string): string {
  return env[name] ?? fallback;
}

function hoursToSeconds(hours: number): number {
  return Math.max(0, Math.trunc(hours * 3600));
}

/**
 * First non-blank of <APP>_<MODE>_COOLDOWN_HOURS, <APP>_COOLDOWN_HOURS,
 * COOLDOWN_HOURS; otherwise the default.
 */
export function cooldownSecondsFor(env: Env, app: AppKey, mode: SearchMode, defaultSeconds: number): number {
  const prefix = app.toUpperCase();
  const names = [`${prefix}_${mode.toUpperCase()}_COOLDOWN_HOURS`, `${prefix}_COOLDOWN_HOURS`, "COOLDOWN_HOURS"];
  for (const name of names) {
    if (!isBlank(env[name])) return hoursToSeconds(envFloat(env, name, 0));
  }
  return defaultSeconds;
}

function loadAppConfig(env: Env, app: AppKey, defaultCooldownSeconds: number): ArrAppConfig {
  const prefix = app.toUpperCase();
  return {
    enabled: envBool(env, `${prefix}_ENABLED`, true),
    url: envString(env, `${prefix}_URL`, "").trim(),
    apiKey: envString(env, `${prefix}_API_KEY`, "").trim(),
    missingLimit: envInt(env, `${prefix}_MISSING_LIMIT`, 10),
    upgradesLimit: envInt(env, `${prefix}_UPGRADES_LIMIT`, 10),
    promoteLimit: envInt(env, `${prefix}_PROMOTE_LIMIT`, 50),
    cooldownSeconds: {
      missing: cooldownSecondsFor(env, app, "missing", defaultCooldownSeconds),
      upgrades: cooldownSecondsFor(env, app, "upgrades", defaultCooldownSeconds),
    },
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const stateDir = envString(env, "STATE_DIR", DEFAULT_STATE_DIR);
  const defaultCooldownSeconds = Math.max(0, envInt(env, "DEFAULT_COOLDOWN_HOURS", 0)) * 3600;
  const randomSeed = env.RANDOM_SEED;
  const redisUrl = env.REDIS_URL?.trim();

  return {
    logLevel: envString(env, "LOG_LEVEL", "info").toLowerCase(),
    randomSeed: randomSeed ? randomSeed : undefined,
    tagSearch: envString(env, "TAG_SEARCH", "search"),
    tagDone: envString(env, "TAG_DONE", "done"),
    runIntervalMinutes: envInt(env, "RUN_INTERVAL_MINUTES", 60),
    wantedPageSize: envInt(env, "WANTED_PAGE_SIZE", 200),
    httpTimeoutSeconds: envInt(env, "HTTP_TIMEOUT_SECONDS", 30),
    dryRun: envBool(env, "DRY_RUN", false),
    stateDir,
    statePath: stateFilePath(stateDir),
    autoPromote: envBool(env, "AUTO_PROMOTE_SEARCH_TO_DONE", true),
    redisUrl: redisUrl ? redisUrl : undefined,
    apps: {
      sonarr: loadAppConfig(env, "sonarr", defaultCooldownSeconds),
      radarr: loadAppConfig(env, "radarr", defaultCooldownSeconds),
      lidarr: loadAppConfig(env, "lidarr", defaultCooldownSeconds),
    },
  };
}
