import type { JsonObject } from "../types";

// Tried in order; the first pattern yielding a non-blank token wins.
const VERSION_PATTERNS: readonly RegExp[] = [
  /Cisco IOS XE Software,\s*Version\s+([^,\n]+)/i,
  /Cisco IOS Software,[^\n]*Version\s+([^,\n]+)/i,
  /\bVersion\s+([0-9A-Za-z.()-]+\d)(?:,\s*RELEASE|\s|$)/i,
  /IOS[-\s]?XE Software,[^\n]*Version\s+([^,\n]+)/i,
];

export function extractIosVersion(rawText: string): string | null {
  if (!rawText) {
    return null;
  }
  for (const pattern of VERSION_PATTERNS) {
    const match = pattern.exec(rawText);
    const version = match?.[1]?.trim();
    if (version) {
      return version;
    }
  }
  return null;
}

function isBlankVersion(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && !value.trim());
}

/**
 * Returns a copy of `data` whose `parsed.version` is filled from `data.raw`
 * when the server left it empty. Anything else is returned untouched.
 */
export function recoverVersion<T extends JsonObject>(data: T): T {
  const parsed = data.parsed;
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    return data;
  }
  const parsedRecord: JsonObject = { ...parsed };
  if (!isBlankVersion(parsedRecord.version)) {
    return data;
  }

  const raw = typeof data.raw === "string" ? data.raw : "";
  const recovered = extractIosVersion(raw);
  if (!recovered) {
    return data;
  }
  return { ...data, parsed: { ...parsedRecord, version: recovered } };
}
