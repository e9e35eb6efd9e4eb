import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  validateToken,
  requireValidToken,
  isAuthEnabled,
  ConfluenceRagAuthError,
} from "../src/auth/validateToken";
import { ErrorCode } from "../src/errors";
import { createMockRuntime } from "./setup";

describe("validateToken", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.CONFLUENCE_RAG_AUTH_ENABLED;
    delete process.env.CONFLUENCE_RAG_AUTH_TOKEN;
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe("when auth is disabled (default)", () => {
    it("should allow all operations when auth is not enabled", () => {
      const result = validateToken(createMockRuntime(), undefined);

      expect(result.valid).toBe(true);
      expect(result.authEnabled).toBe(false);
      expect(isAuthEnabled(createMockRuntime())).toBe(false);
    });

    it("should allow operations even with a token when auth is off", () => {
      const result = validateToken(createMockRuntime(), "any-token");

      expect(result.valid).toBe(true);
      expect(result.authEnabled).toBe(false);
    });
  });

  describe("when auth is enabled but token not configured", () => {
    beforeEach(() => {
      process.env.CONFLUENCE_RAG_AUTH_ENABLED = "true";
    });

    it("should reject with misconfiguration error", () => {
      const result = validateToken(createMockRuntime(), "any-token");

      expect(result.valid).toBe(false);
      expect(result.needsToken).toBe(false);
      expect(result.error).toContain("CONFLUENCE_RAG_AUTH_TOKEN is not set");
    });
  });

  describe("when auth is enabled and token is configured", () => {
    beforeEach(() => {
      process.env.CONFLUENCE_RAG_AUTH_ENABLED = "true";
      process.env.CONFLUENCE_RAG_AUTH_TOKEN = "test-secret";
    });

    it("should reject when no token is provided", () => {
      const result = validateToken(createMockRuntime(), undefined);

      expect(result.valid).toBe(false);
      expect(result.needsToken).toBe(true);
      expect(result.error).toContain("requires authentication");
    });

    it("should reject when whitespace-only string is provided", () => {
      const result = validateToken(createMockRuntime(), "   ");

      expect(result.valid).toBe(false);
      expect(result.needsToken).toBe(true);
    });

    it("should reject when wrong token is provided", () => {
      const result = validateToken(createMockRuntime(), "wrong-secret");

      expect(result.valid).toBe(false);
      expect(result.needsToken).toBe(false);
      expect(result.error).toContain("Invalid auth token");
    });

    it("should reject a token that is a prefix of the configured one", () => {
      expect(validateToken(createMockRuntime(), "test").valid).toBe(false);
    });

    it("should accept when correct token is provided", () => {
      const result = validateToken(createMockRuntime(), "test-secret");

      expect(result.valid).toBe(true);
      expect(result.error).toBeUndefined();
    });

    it("should accept a correct token with surrounding whitespace", () => {
      expect(validateToken(createMockRuntime(), "  test-secret ").valid).toBe(true);
    });
  });

  describe("runtime settings override", () => {
    it("should use runtime setting over environment variable", () => {
      process.env.CONFLUENCE_RAG_AUTH_ENABLED = "true";
      process.env.CONFLUENCE_RAG_AUTH_TOKEN = "env-secret";
      const runtime = createMockRuntime({
        settings: {
          CONFLUENCE_RAG_AUTH_ENABLED: "true",
          CONFLUENCE_RAG_AUTH_TOKEN: "runtime-secret",
        },
      });

      expect(validateToken(runtime, "env-secret").valid).toBe(false);
      expect(validateToken(runtime, "runtime-secret").valid).toBe(true);
    });

    it("should let a runtime 'false' disable auth enabled in the environment", () => {
      process.env.CONFLUENCE_RAG_AUTH_ENABLED = "true";
      const runtime = createMockRuntime({ settings: { CONFLUENCE_RAG_AUTH_ENABLED: false } });

      expect(validateToken(runtime, undefined).valid).toBe(true);
    });
  });
});

describe("requireValidToken", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    process.env.CONFLUENCE_RAG_AUTH_ENABLED = "true";
    process.env.CONFLUENCE_RAG_AUTH_TOKEN = "test-secret";
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("should not throw when token is valid", () => {
    expect(() => requireValidToken(createMockRuntime(), "test-secret")).not.toThrow();
  });

  it("should throw ConfluenceRagAuthError when token is invalid", () => {
    expect(() => requireValidToken(createMockRuntime(), "invalid-secret")).toThrow(ConfluenceRagAuthError);
  });

  it("should flag a missing token with AUTH_REQUIRED", () => {
    try {
      requireValidToken(createMockRuntime(), undefined);
      expect.fail("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfluenceRagAuthError);
      if (err instanceof ConfluenceRagAuthError) {
        expect(err.needsToken).toBe(true);
        expect(err.code).toBe(ErrorCode.AUTH_REQUIRED);
      }
    }
  });

  it("should include error message in thrown error", () => {
    expect(() => requireValidToken(createMockRuntime(), "wrong")).toThrow("Invalid auth token");
  });
});

describe("ConfluenceRagAuthError", () => {
  it("should have correct name and message", () => {
    const error = new ConfluenceRagAuthError("test message");
    expect(error.name).toBe("ConfluenceRagAuthError");
    expect(error.message).toBe("test message");
    expect(error).toBeInstanceOf(Error);
  });

  it("should track needsToken flag", () => {
    expect(new ConfluenceRagAuthError("needs token", true).needsToken).toBe(true);
    expect(new ConfluenceRagAuthError("no need").needsToken).toBe(false);
    expect(new ConfluenceRagAuthError("no need").code).toBe(ErrorCode.AUTH_INVALID_TOKEN);
  });
});
