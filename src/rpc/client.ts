import { z } from "zod";
import type { Logger } from "../logger";
import type {
  ClientInfo,
  CommandSpec,
  ResponseDocument,
  ServerIdentity,
  ToolDescriptor,
} from "../types";
import { TransportError } from "./errors";
import { PendingResponseTable } from "./pending-table";
import { ResponseReader } from "./reader";
import { startProcess, type ChildHandle } from "./supervisor";

export type ClientState = "unstarted" | "started" | "initialized" | "ready" | "closed";

export interface RpcClientOptions {
  logger?: Logger;
  maxPendingResponses?: number;
  onDiagnostic?: (line: string) => void;
}

const DEFAULT_MAX_PENDING_RESPONSES = 1000;

const initializeResultSchema = z.object({
  serverInfo: z
    .object({
      name: z.string(),
      version: z.string().optional(),
    })
    .passthrough(),
});

const toolsListResultSchema = z.object({
  tools: z
    .array(
      z
        .object({
          name: z.string().min(1),
          description: z.string().optional(),
          inputSchema: z.record(z.unknown()).optional(),
        })
        .passthrough(),
    )
    .default([]),
});

/**
 * Newline-delimited JSON-RPC client for a tool server running as a child process.
 *
 * Requests are correlated to responses by id; the server may answer in any order.
 */
export class RpcClient {
  private lastId = 0;
  private currentState: ClientState = "unstarted";
  private readonly table: PendingResponseTable;
  private readonly reader: ResponseReader;
  private readonly logger?: Logger;

  constructor(
    private readonly child: ChildHandle,
    options: RpcClientOptions = {},
  ) {
    this.logger = options.logger;
    this.table = new PendingResponseTable(
      options.maxPendingResponses ?? DEFAULT_MAX_PENDING_RESPONSES,
      options.logger,
    );
    this.reader = new ResponseReader({
      table: this.table,
      logger: options.logger,
      onDiagnostic:
        options.onDiagnostic ?? ((line) => this.logger?.warn({ source: "server" }, line)),
      // No more replies can arrive once the server's output is gone.
      onClose: () => this.table.dispose("tool server output closed"),
    });

    child.stdin.on("error", (error) => {
      this.logger?.error({ err: error }, "tool server stdin error");
    });

    this.reader.attach(child.stdout);
    if (child.stderr) {
      this.reader.attach(child.stderr);
    }
    this.currentState = "started";
  }

  static async launch(command: CommandSpec, options: RpcClientOptions = {}): Promise<RpcClient> {
    const child = await startProcess(command, options.logger);
    return new RpcClient(child, options);
  }

  get state(): ClientState {
    return this.currentState;
  }

  /** Responses received that no caller has claimed yet. */
  get unclaimedResponses(): number {
    return this.table.size;
  }

  nextId(): number {
    this.lastId += 1;
    return this.lastId;
  }

  send(method: string, params?: unknown, id?: number): number {
    const requestId = id ?? this.nextId();
    const payload =
      params === undefined
        ? { jsonrpc: "2.0", id: requestId, method }
        : { jsonrpc: "2.0", id: requestId, method, params };
    this.write(payload);
    return requestId;
  }

  async wait(id: number, timeoutMs: number, method?: string): Promise<ResponseDocument> {
    return await this.table.wait(id, timeoutMs, method);
  }

  async request(method: string, params: unknown, timeoutMs: number): Promise<ResponseDocument> {
    const id = this.send(method, params);
    return await this.wait(id, timeoutMs, method);
  }

  notify(method: string, params?: unknown): void {
    const payload =
      params === undefined ? { jsonrpc: "2.0", method } : { jsonrpc: "2.0", method, params };
    this.write(payload);
  }

  /**
   * Runs the `initialize` round-trip followed by `notifications/initialized`.
   */
  async initialize(
    clientInfo: ClientInfo,
    protocolVersion: string,
    timeoutMs: number,
  ): Promise<ServerIdentity> {
    const response = await this.request(
      "initialize",
      {
        protocolVersion,
        capabilities: { tools: {} },
        clientInfo,
      },
      timeoutMs,
    );
    if ("error" in response) {
      throw new Error(`initialize failed: ${JSON.stringify(response.error)}`);
    }

    const parsed = initializeResultSchema.safeParse(response.result);
    if (!parsed.success) {
      throw new Error("initialize response did not include serverInfo.name", {
        cause: parsed.error,
      });
    }

    this.notify("notifications/initialized", {});
    this.currentState = "initialized";
    this.logger?.info({ server: parsed.data.serverInfo.name }, "session initialized");
    return {
      name: parsed.data.serverInfo.name,
      version: parsed.data.serverInfo.version,
    };
  }

  async listTools(timeoutMs: number): Promise<ToolDescriptor[]> {
    const response = await this.request("tools/list", undefined, timeoutMs);
    if ("error" in response) {
      throw new Error(`tools/list failed: ${JSON.stringify(response.error)}`);
    }

    const parsed = toolsListResultSchema.safeParse(response.result ?? {});
    if (!parsed.success) {
      throw new Error("tools/list response is malformed", { cause: parsed.error });
    }

    if (this.currentState === "initialized") {
      this.currentState = "ready";
    }
    return parsed.data.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }

  /**
   * Logs when tools are used before the handshake; the call still goes out.
   */
  warnIfNotInitialized(operation: string): void {
    if (this.currentState === "started" || this.currentState === "unstarted") {
      this.logger?.warn({ operation, state: this.currentState }, "tool call before initialize");
    }
  }

  close(): void {
    if (this.currentState === "closed") {
      return;
    }
    this.currentState = "closed";
    this.table.dispose("client closed");
    try {
      this.child.stdin.end();
    } catch (error) {
      this.logger?.debug({ err: error }, "closing stdin failed");
    }
    this.child.terminate();
  }

  private write(payload: unknown): void {
    if (this.currentState === "closed") {
      throw new TransportError("RPC client is closed.");
    }
    const stdin = this.child.stdin;
    if (!stdin.writable) {
      throw new TransportError("Tool server stdin is not writable.");
    }
    // One JSON document per line.
    stdin.write(`${JSON.stringify(payload)}\n`, "utf8");
  }
}
