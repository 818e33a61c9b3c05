import { z } from "zod";
import type { JsonObject } from "../types";
import { recoverVersion } from "./version";

const jsonObjectSchema = z.record(z.unknown());

const contentFragmentSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("json"), data: jsonObjectSchema.default({}) }),
  z.object({ type: z.literal("text"), text: z.string() }),
]);

export type ContentFragment = z.infer<typeof contentFragmentSchema>;

/** Keys every display result carries, `null` when the server left them out. */
export const DISPLAY_KEYS = ["raw", "parsed", "commands", "saved", "dry_run", "device", "error"] as const;

export type DisplayKey = (typeof DISPLAY_KEYS)[number];

export type DisplayResult = JsonObject & Record<DisplayKey, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/**
 * Reads `result.content` into typed fragments. Entries of any other shape are skipped.
 */
export function readContentFragments(result: unknown): ContentFragment[] {
  if (!isJsonObject(result) || !Array.isArray(result.content)) {
    return [];
  }
  const fragments: ContentFragment[] = [];
  for (const entry of result.content) {
    const parsed = contentFragmentSchema.safeParse(entry);
    if (parsed.success) {
      fragments.push(parsed.data);
    }
  }
  return fragments;
}

/** Own-key copy that keeps keys such as `__proto__` as plain data. */
function copyInto(target: JsonObject, source: JsonObject): void {
  for (const [key, value] of Object.entries(source)) {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
  }
}

function parseJsonObject(text: string): JsonObject | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  return isJsonObject(value) ? value : null;
}

/**
 * Flattens a tool call result into one mapping, exactly as the server sent it.
 *
 * Structured (`json`) fragments win: text fragments are only decoded when no
 * structured fragment was present. Later fragments overwrite earlier keys.
 */
export function mergeContentFragments(result: unknown): JsonObject {
  const fragments = readContentFragments(result);
  const merged: JsonObject = {};

  let foundStructured = false;
  for (const fragment of fragments) {
    if (fragment.type === "json") {
      copyInto(merged, fragment.data);
      foundStructured = true;
    }
  }
  if (foundStructured) {
    return merged;
  }

  for (const fragment of fragments) {
    if (fragment.type === "text") {
      const decoded = parseJsonObject(fragment.text);
      if (decoded) {
        copyInto(merged, decoded);
      }
    }
  }
  return merged;
}

export function isVersionTool(toolName: string): boolean {
  return toolName.startsWith("get_version");
}

/**
 * Fills the fixed display keys and, for version tools, recovers a missing
 * `parsed.version` from the raw command output.
 */
export function toDisplayResult(toolName: string, payload: JsonObject): DisplayResult {
  const filled: DisplayResult = {
    ...payload,
    raw: payload.raw ?? null,
    parsed: payload.parsed ?? null,
    commands: payload.commands ?? null,
    saved: payload.saved ?? null,
    dry_run: payload.dry_run ?? null,
    device: payload.device ?? null,
    error: payload.error ?? null,
  };
  return isVersionTool(toolName) ? recoverVersion(filled) : filled;
}
