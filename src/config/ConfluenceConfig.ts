import {
  CONFLUENCE_DEFAULTS,
  EXPORT_DEFAULTS,
  HTTP_DEFAULTS,
  PROCESSING_DEFAULTS,
} from "./constants";
import { ConfluenceRagConfigurationError } from "../errors/ConfigurationError";

/**
 * Anything that can answer a setting lookup. An elizaOS runtime satisfies
 * this through `getSetting`.
 */
export interface SettingsSource {
  getSetting(key: string): unknown;
}

export interface ConfluenceConfig {
  baseUrl?: string;
  username?: string;
  apiToken?: string;
  requestTimeoutMs: number;
  extractorTimeoutMs: number;
  rateLimit: number;
  rateWindowMs: number;
  outputDir: string;
}

export interface ConfluenceCredentials {
  baseUrl: string;
  username: string;
  apiToken: string;
}

export const DEFAULT_CONFLUENCE_CONFIG: ConfluenceConfig = {
  requestTimeoutMs: HTTP_DEFAULTS.TIMEOUT_MS,
  extractorTimeoutMs: PROCESSING_DEFAULTS.EXTRACTOR_TIMEOUT_MS,
  rateLimit: CONFLUENCE_DEFAULTS.RATE_LIMIT,
  rateWindowMs: CONFLUENCE_DEFAULTS.RATE_WINDOW_MS,
  outputDir: EXPORT_DEFAULTS.OUTPUT_DIR,
};

const NO_SETTINGS: SettingsSource = { getSetting: () => undefined };

/**
 * Resolve configuration: runtime settings first, then environment.
 * Unusable numeric values fall back to defaults.
 */
export function getConfluenceConfig(
  settings: SettingsSource = NO_SETTINGS,
  env: NodeJS.ProcessEnv = process.env
): ConfluenceConfig {
  const read = (key: string): string | undefined => {
    const value = settings.getSetting(key);
    if (typeof value === "string" && value.trim()) return value.trim();
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    const fromEnv = env[key];
    return fromEnv && fromEnv.trim() ? fromEnv.trim() : undefined;
  };

  const readNumber = (key: string, fallback: number, min: number): number => {
    const raw = read(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
  };

  const baseUrl = read("CONFLUENCE_URL")?.replace(/\/+$/, "");

  return {
    baseUrl,
    username: read("CONFLUENCE_USERNAME"),
    apiToken: read("CONFLUENCE_API_TOKEN"),
    requestTimeoutMs: readNumber("CONFLUENCE_REQUEST_TIMEOUT_MS", DEFAULT_CONFLUENCE_CONFIG.requestTimeoutMs, 1),
    extractorTimeoutMs: readNumber("CONFLUENCE_EXTRACTOR_TIMEOUT_MS", DEFAULT_CONFLUENCE_CONFIG.extractorTimeoutMs, 1),
    rateLimit: readNumber("CONFLUENCE_RATE_LIMIT", DEFAULT_CONFLUENCE_CONFIG.rateLimit, 1),
    rateWindowMs: readNumber("CONFLUENCE_RATE_WINDOW_MS", DEFAULT_CONFLUENCE_CONFIG.rateWindowMs, 1),
    outputDir: read("CONFLUENCE_OUTPUT_DIR") ?? DEFAULT_CONFLUENCE_CONFIG.outputDir,
  };
}

/**
 * Credentials needed to talk to Confluence; throws when any are missing.
 */
export function requireCredentials(config: ConfluenceConfig): ConfluenceCredentials {
  const missing: string[] = [];
  if (!config.baseUrl) missing.push("CONFLUENCE_URL");
  if (!config.username) missing.push("CONFLUENCE_USERNAME");
  if (!config.apiToken) missing.push("CONFLUENCE_API_TOKEN");

  if (!config.baseUrl || !config.username || !config.apiToken) {
    throw ConfluenceRagConfigurationError.missingCredentials(missing);
  }

  return {
    baseUrl: config.baseUrl,
    username: config.username,
    apiToken: config.apiToken,
  };
}
