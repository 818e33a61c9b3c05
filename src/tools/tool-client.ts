import type { RpcClient } from "../rpc/client";
import { ToolError } from "../rpc/errors";
import type { JsonObject } from "../types";
import { mergeContentFragments, toDisplayResult, type DisplayResult } from "./normalize";

const DEFAULT_TOOL_TIMEOUT_MS = 90000;

/**
 * Calls named tools over `tools/call` and normalizes what comes back.
 */
export class ToolClient {
  constructor(
    private readonly rpc: RpcClient,
    private readonly defaultTimeoutMs = DEFAULT_TOOL_TIMEOUT_MS,
  ) {}

  /**
   * Returns the merged payload exactly as the server sent it.
   * Throws `ToolError` when the server reports an error.
   */
  async call(toolName: string, args: JsonObject = {}, timeoutMs?: number): Promise<JsonObject> {
    this.rpc.warnIfNotInitialized(toolName);
    const response = await this.rpc.request(
      "tools/call",
      { name: toolName, arguments: args },
      timeoutMs ?? this.defaultTimeoutMs,
    );
    if ("error" in response) {
      throw new ToolError(toolName, response.error);
    }
    return mergeContentFragments(response.result);
  }

  async callForDisplay(
    toolName: string,
    args: JsonObject = {},
    timeoutMs?: number,
  ): Promise<DisplayResult> {
    const payload = await this.call(toolName, args, timeoutMs);
    return toDisplayResult(toolName, payload);
  }
}
