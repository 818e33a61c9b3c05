/**
 * The tool server could not be started. Fatal for the client; not retried.
 */
export class LaunchError extends Error {
  readonly command: string;

  constructor(command: string, options?: ErrorOptions) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Failed to start tool server '${command}'${reason}`, options);
    this.name = "LaunchError";
    this.command = command;
  }
}

/**
 * No response arrived for a request before its deadline. Safe to retry.
 */
export class TimeoutError extends Error {
  readonly id: number;
  readonly method: string;
  readonly timeoutMs: number;

  constructor(id: number, method: string, timeoutMs: number) {
    super(`Timeout waiting for ${method} (id ${id}) after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.id = id;
    this.method = method;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The server answered a tools/call with an error. The payload is kept exactly as sent.
 */
export class ToolError extends Error {
  readonly toolName: string;
  readonly payload: unknown;

  constructor(toolName: string, payload: unknown) {
    super(`Tool '${toolName}' error: ${describePayload(payload)}`);
    this.name = "ToolError";
    this.toolName = toolName;
    this.payload = payload;
  }
}

/**
 * A line from the server was not JSON. Only ever raised inside the reader.
 */
export class DecodeError extends Error {
  readonly line: string;

  constructor(line: string, options?: ErrorOptions) {
    super("Server output line is not valid JSON", options);
    this.name = "DecodeError";
    this.line = line;
  }
}

/**
 * Writing to the server failed, or the client was closed under a pending call.
 */
export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportError";
  }
}

function describePayload(payload: unknown): string {
  if (typeof payload === "string") {
    return payload;
  }
  try {
    return JSON.stringify(payload) ?? String(payload);
  } catch {
    return String(payload);
  }
}
