import { ConfluenceRagError, ErrorCode } from "../errors/ConfluenceRagError";
import type { SettingsSource } from "../config/ConfluenceConfig";

export interface TokenValidationResult {
  valid: boolean;
  authEnabled: boolean;
  needsToken: boolean;
  error?: string;
}

export interface AuthConfig {
  enabled: boolean;
  token?: string;
}

/**
 * CONFLUENCE-RAG AUTH SCHEMA
 * ==========================
 *
 * - Auth is OFF by default.
 * - When enabled, a token is REQUIRED for operations that call Confluence
 *   or write exports (extract page, extract space).
 * - Read-only operations (corpus analysis, provider) never need a token.
 *
 * Configuration:
 * - CONFLUENCE_RAG_AUTH_ENABLED: "true" | "false" (default: false)
 * - CONFLUENCE_RAG_AUTH_TOKEN: string (only checked when enabled)
 */

/**
 * Gets the current auth configuration from runtime settings or environment.
 */
export function getAuthConfig(settings: SettingsSource): AuthConfig {
  const runtimeEnabled = settings.getSetting("CONFLUENCE_RAG_AUTH_ENABLED");
  const runtimeToken = settings.getSetting("CONFLUENCE_RAG_AUTH_TOKEN");

  let enabled = false;
  if (runtimeEnabled === true || runtimeEnabled === "true") {
    enabled = true;
  } else if (runtimeEnabled === false || runtimeEnabled === "false") {
    enabled = false;
  } else {
    const envEnabled = process.env.CONFLUENCE_RAG_AUTH_ENABLED;
    enabled = envEnabled === "true" || envEnabled === "1";
  }

  let token: string | undefined;
  if (typeof runtimeToken === "string" && runtimeToken.trim()) {
    token = runtimeToken;
  } else {
    token = process.env.CONFLUENCE_RAG_AUTH_TOKEN || undefined;
  }

  return { enabled, token };
}

/**
 * Validates the auth token for guarded operations.
 *
 * `needsToken` is set when auth is on and no token was provided, so the
 * agent can ask for one instead of reporting a failure.
 */
export function validateToken(
  settings: SettingsSource,
  providedToken: string | undefined
): TokenValidationResult {
  const config = getAuthConfig(settings);

  if (!config.enabled) {
    return {
      valid: true,
      authEnabled: false,
      needsToken: false,
    };
  }

  if (!config.token) {
    return {
      valid: false,
      authEnabled: true,
      needsToken: false,
      error:
        "Auth is enabled but CONFLUENCE_RAG_AUTH_TOKEN is not set. " +
        "Please configure the token or disable auth.",
    };
  }

  if (!providedToken || providedToken.trim() === "") {
    return {
      valid: false,
      authEnabled: true,
      needsToken: true,
      error: "This operation requires authentication. Please provide the auth token.",
    };
  }

  if (!constantTimeCompare(providedToken.trim(), config.token)) {
    return {
      valid: false,
      authEnabled: true,
      needsToken: false,
      error: "Invalid auth token. Access denied.",
    };
  }

  return {
    valid: true,
    authEnabled: true,
    needsToken: false,
  };
}

/**
 * Constant-time string comparison.
 */
function constantTimeCompare(a: string, b: string): boolean {
  let result = a.length ^ b.length;
  for (let i = 0; i < a.length; i++) {
    result |= a.charCodeAt(i) ^ (b.charCodeAt(i % Math.max(b.length, 1)) || 0);
  }
  return result === 0;
}

/**
 * Validate the token and throw a structured error if it is rejected.
 */
export function requireValidToken(
  settings: SettingsSource,
  providedToken: string | undefined
): void {
  const result = validateToken(settings, providedToken);
  if (!result.valid) {
    throw new ConfluenceRagAuthError(
      result.error || "Authentication failed.",
      result.needsToken
    );
  }
}

export class ConfluenceRagAuthError extends ConfluenceRagError {
  public readonly needsToken: boolean;

  constructor(message: string, needsToken: boolean = false) {
    super(
      message,
      needsToken ? ErrorCode.AUTH_REQUIRED : ErrorCode.AUTH_INVALID_TOKEN,
      { operation: "auth" }
    );
    this.name = "ConfluenceRagAuthError";
    this.needsToken = needsToken;
  }
}

export function isAuthEnabled(settings: SettingsSource): boolean {
  return getAuthConfig(settings).enabled;
}
