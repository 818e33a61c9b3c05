import readline from "node:readline";
import type { Readable } from "node:stream";
import type { Logger } from "../logger";
import type { ResponseDocument } from "../types";
import { DecodeError } from "./errors";
import type { PendingResponseTable } from "./pending-table";

const DIAGNOSTIC_MARKER = /warning|error/i;

export interface ResponseReaderOptions {
  table: PendingResponseTable;
  /** Receives non-JSON server lines that look like warnings or errors. */
  onDiagnostic: (line: string) => void;
  onClose?: () => void;
  logger?: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function hasOwn(record: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

export function decodeLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch (error) {
    throw new DecodeError(line, { cause: error });
  }
}

export function isResponseDocument(value: unknown): value is ResponseDocument {
  return (
    isRecord(value) &&
    typeof value.id === "number" &&
    Number.isInteger(value.id) &&
    (hasOwn(value, "result") || hasOwn(value, "error"))
  );
}

export function isDiagnosticLine(line: string): boolean {
  return DIAGNOSTIC_MARKER.test(line);
}

/**
 * Drains server output streams line by line and files responses by id.
 * Stops quietly when the streams end; callers notice through wait timeouts.
 */
export class ResponseReader {
  private openStreams = 0;
  private stopped = false;

  constructor(private readonly options: ResponseReaderOptions) {}

  get running(): boolean {
    return !this.stopped;
  }

  attach(stream: Readable): void {
    this.openStreams += 1;
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });

    lines.on("line", (line) => this.handleLine(line));

    stream.on("error", (error) => {
      this.options.logger?.warn({ err: error }, "server output stream error");
      lines.close();
    });

    lines.once("close", () => {
      this.openStreams -= 1;
      if (this.openStreams === 0 && !this.stopped) {
        this.stopped = true;
        this.options.logger?.warn("server output closed; reader stopped");
        this.options.onClose?.();
      }
    });
  }

  handleLine(rawLine: string): void {
    const line = rawLine.trim();
    if (!line) {
      return;
    }

    let message: unknown;
    try {
      message = decodeLine(line);
    } catch (error) {
      if (isDiagnosticLine(line)) {
        this.options.onDiagnostic(line);
      } else {
        this.options.logger?.debug({ err: error }, "dropped non-JSON server line");
      }
      return;
    }

    if (isResponseDocument(message)) {
      this.options.table.deliver(message);
      return;
    }

    this.options.logger?.trace({ message }, "ignored server message without response id");
  }
}
