import readline from "node:readline";
import { PassThrough } from "node:stream";
import type { ChildHandle } from "../../rpc/supervisor";
import { isJsonObject } from "../../tools/normalize";
import type { JsonObject } from "../../types";

type Responder = (message: JsonObject) => unknown;

/**
 * In-process stand-in for the tool server: reads request lines the client
 * writes to stdin and lets the test write whatever it likes to stdout.
 */
export class FakeChild implements ChildHandle {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid = 4242;
  readonly received: JsonObject[] = [];
  terminated = false;

  private readonly queue: JsonObject[] = [];
  private readonly waiters: Array<(message: JsonObject) => void> = [];
  private responder?: Responder;

  constructor() {
    const lines = readline.createInterface({ input: this.stdin, crlfDelay: Infinity });
    lines.on("line", (line) => {
      const message: JsonObject = JSON.parse(line);
      this.received.push(message);
      const reply = this.responder?.(message);
      if (reply !== undefined) {
        this.send(reply);
      }
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(message);
      } else {
        this.queue.push(message);
      }
    });
  }

  isAlive(): boolean {
    return !this.terminated;
  }

  terminate(): void {
    this.terminated = true;
    this.stdout.end();
    this.stderr.end();
  }

  /** Answers every incoming message with whatever `responder` returns (undefined = no answer). */
  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  send(document: unknown): void {
    this.stdout.write(`${JSON.stringify(document)}\n`);
  }

  writeLine(line: string, stream: "stdout" | "stderr" = "stdout"): void {
    this[stream].write(`${line}\n`);
  }

  async nextMessage(): Promise<JsonObject> {
    const queued = this.queue.shift();
    if (queued) {
      return queued;
    }
    return await new Promise<JsonObject>((resolve) => this.waiters.push(resolve));
  }
}

export function toolResult(content: unknown[]): JsonObject {
  return { content };
}

/**
 * Responder for a device tool server: answers the handshake and routes
 * tools/call to `tools[name]`, which returns the `result` (or throws for `error`).
 */
export function deviceServer(tools: Record<string, (args: JsonObject) => unknown>): Responder {
  return (message) => {
    if (typeof message.id !== "number") {
      return undefined;
    }
    switch (message.method) {
      case "initialize":
        return { jsonrpc: "2.0", id: message.id, result: { serverInfo: { name: "lab-devices", version: "1.0" } } };
      case "tools/list":
        return {
          jsonrpc: "2.0",
          id: message.id,
          result: { tools: Object.keys(tools).map((name) => ({ name, description: `${name} tool` })) },
        };
      case "tools/call": {
        const params: JsonObject = isJsonObject(message.params) ? message.params : {};
        const name = String(params.name);
        const handler = tools[name];
        if (!handler) {
          return { jsonrpc: "2.0", id: message.id, error: { code: -32601, message: `unknown tool ${name}` } };
        }
        try {
          return { jsonrpc: "2.0", id: message.id, result: handler(isJsonObject(params.arguments) ? params.arguments : {}) };
        } catch (error) {
          return {
            jsonrpc: "2.0",
            id: message.id,
            error: { code: -32000, message: error instanceof Error ? error.message : String(error) },
          };
        }
      }
      default:
        return undefined;
    }
  };
}
