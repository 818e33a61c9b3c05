export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export interface CommandSpec {
  executable: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
}

export interface ClientInfo {
  name: string;
  version: string;
}

export interface ServerFile {
  server: CommandSpec;
  client: ClientInfo;
  protocolVersion: string;
}

/** Prefilled answers for the configuration wizards. */
export interface WizardDefaults {
  interface: string;
  ip: string;
  mask?: string;
  replace: boolean;
  noShutdown: boolean;
  save: boolean;
  dryRun: boolean;
  loopbackId: number;
  loopbackIp: string;
  loopbackDescription: string;
}

export interface AppConfig {
  serverConfigPath: string;
  logLevel: LogLevel;
  // Timeouts in milliseconds
  requestTimeoutMs: number;
  listTimeoutMs: number;
  toolTimeoutMs: number;
  configToolTimeoutMs: number;
  // Upper bound on responses nobody has claimed yet
  maxPendingResponses: number;
  initializedSettleMs: number;
  wizardDefaults: WizardDefaults;
}

export type JsonObject = Record<string, unknown>;

export interface ResponseDocument {
  id: number;
  result?: unknown;
  error?: unknown;
  [key: string]: unknown;
}

export interface ToolDescriptor {
  name: string;
  description?: string;
  inputSchema?: JsonObject;
}

export interface ServerIdentity {
  name: string;
  version?: string;
}
