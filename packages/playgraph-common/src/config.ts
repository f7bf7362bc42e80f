import { readFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";

export type VerifyMode = "none" | "end" | "incremental";

export const VERIFY_MODES: readonly VerifyMode[] = ["none", "end", "incremental"];

export interface RetrySettings {
  /** Total attempts per remote operation, first one included */
  attempts: number;
  delayMs: number;
  backoffFactor: number;
}

export interface SpotifySettings {
  apiBaseUrl?: string;
}

export interface PlaygraphConfig {
  /** Directory scanned for node-definition files when none are named */
  userConfigDir: string;
  verifyMode: VerifyMode;
  concurrency: number;
  requestTimeoutMs: number;
  retry: RetrySettings;
  spotify?: SpotifySettings;
}

export const DEFAULT_CONFIG_FILENAME = ".playgraph.json";

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  attempts: 5,
  delayMs: 500,
  backoffFactor: 2,
};

let cachedConfig: PlaygraphConfig | null = null;
let cachedPath: string | null = null;

export class ConfigError extends Error {
  declare cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "ConfigError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function getDefaultConfigPath(cwd: string = process.cwd()): string {
  return path.resolve(cwd, DEFAULT_CONFIG_FILENAME);
}

export function resetConfigCache(): void {
  cachedConfig = null;
  cachedPath = null;
}

export async function loadConfig(configPath?: string): Promise<PlaygraphConfig> {
  const effectivePath = configPath ?? (process.env.PLAYGRAPH_CONFIG || getDefaultConfigPath());
  const resolvedPath = path.resolve(effectivePath);

  if (cachedConfig && cachedPath === resolvedPath) {
    return cachedConfig;
  }

  let contents: string;
  try {
    contents = await readFile(resolvedPath, "utf8");
  } catch (error) {
    throw new ConfigError(`Unable to read playgraph config at ${resolvedPath}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in playgraph config at ${resolvedPath}`, { cause: error });
  }

  const config = validateConfig(data, resolvedPath);

  const overrideDir = process.env.PLAYGRAPH_USER_CONFIG_DIR;
  if (overrideDir && overrideDir.trim().length > 0) {
    config.userConfigDir = path.normalize(overrideDir);
  } else {
    // relative directories are relative to the config file, not the cwd
    config.userConfigDir = path.resolve(path.dirname(resolvedPath), config.userConfigDir);
  }

  cachedConfig = config;
  cachedPath = resolvedPath;
  return config;
}

export function getCachedConfig(): PlaygraphConfig {
  if (!cachedConfig) {
    throw new ConfigError("Config has not been loaded yet. Call loadConfig() first.");
  }
  return cachedConfig;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isVerifyMode(value: unknown): value is VerifyMode {
  return typeof value === "string" && VERIFY_MODES.some((mode) => mode === value);
}

export function validateConfig(value: unknown, configPath: string): PlaygraphConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`Config at ${configPath} must be a JSON object`);
  }

  const requiredString = (key: string): string => {
    const raw = value[key];
    if (typeof raw !== "string" || raw.trim() === "") {
      throw new ConfigError(`Config key "${key}" must be a non-empty string`);
    }
    return path.normalize(raw);
  };

  const optionalInteger = (
    record: Record<string, unknown>,
    key: string,
    fallback: number,
    predicate: (n: number) => boolean,
    requirement: string
  ): number => {
    const raw = record[key];
    if (raw === undefined) {
      return fallback;
    }
    if (typeof raw !== "number" || !Number.isInteger(raw) || !predicate(raw)) {
      throw new ConfigError(`Config key "${key}" must be ${requirement}`);
    }
    return raw;
  };

  let verifyMode: VerifyMode = "end";
  if (value.verifyMode !== undefined) {
    if (!isVerifyMode(value.verifyMode)) {
      throw new ConfigError(`Config key "verifyMode" must be one of ${VERIFY_MODES.join(", ")}`);
    }
    verifyMode = value.verifyMode;
  }

  return {
    userConfigDir: requiredString("userConfigDir"),
    verifyMode,
    concurrency: optionalInteger(value, "concurrency", 4, (n) => n >= 1, "a positive integer"),
    requestTimeoutMs: optionalInteger(value, "requestTimeoutMs", 30_000, (n) => n > 0, "a positive integer"),
    retry: parseRetrySettings(value.retry),
    spotify: parseSpotifySettings(value.spotify),
  };
}

function parseRetrySettings(value: unknown): RetrySettings {
  if (value === undefined) {
    return { ...DEFAULT_RETRY_SETTINGS };
  }
  if (!isRecord(value)) {
    throw new ConfigError(`Config key "retry" must be an object`);
  }

  const settings: RetrySettings = { ...DEFAULT_RETRY_SETTINGS };

  if (value.attempts !== undefined) {
    if (typeof value.attempts !== "number" || !Number.isInteger(value.attempts) || value.attempts < 1) {
      throw new ConfigError(`Config key "retry.attempts" must be a positive integer`);
    }
    settings.attempts = value.attempts;
  }

  if (value.delayMs !== undefined) {
    if (typeof value.delayMs !== "number" || Number.isNaN(value.delayMs) || value.delayMs < 0) {
      throw new ConfigError(`Config key "retry.delayMs" must be a non-negative number`);
    }
    settings.delayMs = value.delayMs;
  }

  if (value.backoffFactor !== undefined) {
    if (typeof value.backoffFactor !== "number" || Number.isNaN(value.backoffFactor) || value.backoffFactor < 1) {
      throw new ConfigError(`Config key "retry.backoffFactor" must be a number >= 1`);
    }
    settings.backoffFactor = value.backoffFactor;
  }

  return settings;
}

function parseSpotifySettings(value: unknown): SpotifySettings | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigError(`Config key "spotify" must be an object`);
  }

  const settings: SpotifySettings = {};
  if (value.apiBaseUrl !== undefined) {
    if (typeof value.apiBaseUrl !== "string" || value.apiBaseUrl.trim() === "") {
      throw new ConfigError(`Config key "spotify.apiBaseUrl" must be a non-empty string`);
    }
    settings.apiBaseUrl = value.apiBaseUrl;
  }
  return settings;
}
