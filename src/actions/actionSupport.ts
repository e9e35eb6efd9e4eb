import type { ActionResult, HandlerCallback, IAgentRuntime, Memory } from "@elizaos/core";
import { validateToken } from "../auth/validateToken";
import { isConfluenceRagError, wrapError, ErrorCode } from "../errors";
import { safeSerialize } from "../utils/safeSerialize";

export function messageText(message: Memory): string {
  return message.content?.text || "";
}

/** A string argument from structured message content, if present. */
export function stringArg(message: Memory, key: string): string | undefined {
  const value = message.content?.[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

// Extract auth token from message text
// Looks for patterns like "token: xyz", "password: xyz", "auth: xyz".
// "key" is not a token marker: "space key: DOCS" names a space.
export function extractTokenFromText(text: string): string | null {
  const explicitPatterns = [
    /(?:token|password|auth)[\s:=]+["']?([^\s"']+)["']?/i,
    /(?:with|using)\s+(?:token|password|auth)[\s:=]*["']?([^\s"']+)["']?/i,
  ];

  for (const pattern of explicitPatterns) {
    const match = text.match(pattern);
    if (match && match[1]) {
      return match[1];
    }
  }

  return null;
}

async function reply(
  callback: HandlerCallback | undefined,
  actionName: string,
  result: ActionResult
): Promise<ActionResult> {
  if (callback && result.text) await callback({ text: result.text, action: actionName });
  return result;
}

export function respond(
  callback: HandlerCallback | undefined,
  actionName: string,
  success: boolean,
  text: string,
  data: Record<string, unknown>
): Promise<ActionResult> {
  return reply(callback, actionName, { success, text, data: safeSerialize(data) });
}

/**
 * Auth gate for actions that call Confluence or write files.
 * Returns the failure result to hand back, or null when the caller may proceed.
 */
export async function checkAuth(
  runtime: IAgentRuntime,
  message: Memory,
  actionName: string,
  callback: HandlerCallback | undefined
): Promise<ActionResult | null> {
  const providedToken = stringArg(message, "authToken") || extractTokenFromText(messageText(message));
  const authResult = validateToken(runtime, providedToken ?? undefined);
  if (authResult.valid) return null;

  if (authResult.needsToken) {
    return respond(
      callback,
      actionName,
      false,
      "Authentication is required to extract Confluence content. " +
        'Please provide the auth token, e.g. "extract page 123 with token: your-token-here".',
      { error: "auth_required", authEnabled: true, needsToken: true }
    );
  }

  return respond(callback, actionName, false, authResult.error || "Authentication failed.", {
    error: "auth_failed",
    authEnabled: authResult.authEnabled,
  });
}

export function serviceUnavailable(
  actionName: string,
  callback: HandlerCallback | undefined
): Promise<ActionResult> {
  return respond(callback, actionName, false, "Confluence service is not available.", {
    error: "service_unavailable",
  });
}

export function failure(
  error: unknown,
  actionName: string,
  callback: HandlerCallback | undefined,
  context: Record<string, unknown>
): Promise<ActionResult> {
  const wrapped = isConfluenceRagError(error)
    ? error
    : wrapError(error, ErrorCode.PROCESSING_FAILED, { operation: actionName });
  return respond(callback, actionName, false, wrapped.toUserMessage(), {
    ...context,
    error: wrapped.toJSON().name,
    code: wrapped.code,
  });
}
