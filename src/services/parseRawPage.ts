import { ConfluenceRagValidationError } from "../errors/ValidationError";
import type { RawAttachment, RawComment, RawPage } from "./PageProcessor.types";

const RAW_PAGE_KEYS = new Set([
  "id",
  "title",
  "content",
  "url",
  "version",
  "lastModified",
  "attachments",
  "comments",
]);

const COMMENT_KEYS = ["id", "author", "created", "content"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(
  record: Record<string, unknown>,
  key: string,
  fallback: string,
  path: string
): string {
  const value = record[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string") {
    throw ConfluenceRagValidationError.invalidFormat(`${path}${key}`, "string", value, {
      operation: "parseRawPage",
    });
  }
  return value;
}

function optionalField(
  record: Record<string, unknown>,
  key: string,
  path: string
): string | undefined {
  const value = record[key];
  return value === undefined || value === null ? undefined : optionalString(record, key, "", path);
}

function parseAttachment(value: unknown, index: number): RawAttachment {
  const path = `attachments[${index}].`;
  if (!isRecord(value)) {
    throw ConfluenceRagValidationError.invalidFormat(`attachments[${index}]`, "object", value, {
      operation: "parseRawPage",
    });
  }
  const { size, ...rest } = value;
  if (size !== undefined && size !== null && (typeof size !== "number" || !Number.isFinite(size))) {
    throw ConfluenceRagValidationError.invalidFormat(`${path}size`, "number", size, {
      operation: "parseRawPage",
    });
  }
  return {
    ...rest,
    id: optionalField(value, "id", path),
    title: optionalField(value, "title", path),
    filename: optionalField(value, "filename", path),
    mediaType: optionalField(value, "mediaType", path),
    url: optionalField(value, "url", path),
    size: typeof size === "number" ? size : undefined,
  };
}

function parseComment(value: unknown, index: number): RawComment {
  if (!isRecord(value)) {
    throw ConfluenceRagValidationError.invalidFormat(`comments[${index}]`, "object", value, {
      operation: "parseRawPage",
    });
  }
  const comment: RawComment = {};
  for (const key of COMMENT_KEYS) {
    if (value[key] !== undefined && value[key] !== null) {
      comment[key] = optionalString(value, key, "", `comments[${index}].`);
    }
  }
  return comment;
}

function parseList<T>(
  record: Record<string, unknown>,
  key: string,
  parseItem: (item: unknown, index: number) => T
): T[] {
  const value = record[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw ConfluenceRagValidationError.invalidFormat(key, "array", value, {
      operation: "parseRawPage",
    });
  }
  return value.map((item: unknown, index) => parseItem(item, index));
}

/**
 * Validate an untyped page record (JSON file, API payload) into a RawPage.
 *
 * Unknown top-level keys and wrongly typed fields are rejected; absent
 * optional fields get their empty defaults. A numeric id is accepted and
 * stringified.
 */
export function parseRawPage(value: unknown): RawPage {
  if (!isRecord(value)) {
    throw ConfluenceRagValidationError.invalidFormat("page", "object", value, {
      operation: "parseRawPage",
    });
  }

  for (const key of Object.keys(value)) {
    if (!RAW_PAGE_KEYS.has(key)) {
      throw ConfluenceRagValidationError.unknownField(key, { operation: "parseRawPage" });
    }
  }

  const rawId = value.id;
  let id: string;
  if (typeof rawId === "number" && Number.isFinite(rawId)) {
    id = String(rawId);
  } else if (typeof rawId === "string" && rawId.trim()) {
    id = rawId;
  } else if (rawId === undefined || rawId === null || rawId === "") {
    throw ConfluenceRagValidationError.missingParam("id", { operation: "parseRawPage" });
  } else {
    throw ConfluenceRagValidationError.invalidFormat("id", "non-empty string", rawId, {
      operation: "parseRawPage",
    });
  }

  const rawVersion = value.version;
  let version = 0;
  if (rawVersion !== undefined && rawVersion !== null) {
    if (typeof rawVersion !== "number" || !Number.isFinite(rawVersion)) {
      throw ConfluenceRagValidationError.invalidFormat("version", "number", rawVersion, {
        operation: "parseRawPage",
        pageId: id,
      });
    }
    version = rawVersion;
  }

  return {
    id,
    title: optionalString(value, "title", "", ""),
    content: optionalString(value, "content", "", ""),
    url: optionalString(value, "url", "", ""),
    version,
    lastModified: optionalString(value, "lastModified", "", ""),
    attachments: parseList(value, "attachments", parseAttachment),
    comments: parseList(value, "comments", parseComment),
  };
}
