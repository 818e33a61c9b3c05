import { readFileSync } from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import type { AppConfig, LogLevel, ServerFile, WizardDefaults } from "./types";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

const commandSchema = z.object({
  executable: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
});

const serverFileSchema = z.object({
  server: commandSchema,
  client: z
    .object({
      name: z.string().min(1).default("device-tool-console"),
      version: z.string().min(1).default("0.1.0"),
    })
    .default({}),
  protocolVersion: z.string().min(1).default("2025-03-26"),
});

function readInt(name: string, fallback: number, min: number): number {
  const raw = process.env[name]?.trim() || String(fallback);
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: ${raw}`);
  }
  return value;
}

// "1"/"0" switches, same convention as the wizard prompts
function readFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  return raw === "1";
}

function readLogLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim() || "info";
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  if (!level) {
    throw new Error(`Invalid LOG_LEVEL: ${raw}`);
  }
  return level;
}

function loadWizardDefaults(): WizardDefaults {
  return {
    interface: process.env.TARGET_IFACE?.trim() || "Ethernet0/0",
    ip: process.env.TARGET_IP?.trim() || "10.10.10.1/24",
    mask: process.env.TARGET_MASK?.trim() || undefined,
    replace: readFlag("REPLACE", true),
    noShutdown: readFlag("NO_SHUT", true),
    save: readFlag("SAVE", false),
    dryRun: readFlag("DRY_RUN", true),
    loopbackId: readInt("LOOPBACK_ID", 0, 0),
    loopbackIp: process.env.LOOPBACK_IP?.trim() || "192.0.2.100/32",
    loopbackDescription: process.env.LOOPBACK_DESC ?? "MCP-created loopback",
  };
}

export function loadAppConfig(): AppConfig {
  const serverConfigPath = path.resolve(
    process.cwd(),
    process.env.SERVER_CONFIG_PATH?.trim() || "config/server.yaml",
  );

  return {
    serverConfigPath,
    logLevel: readLogLevel(),
    requestTimeoutMs: readInt("REQUEST_TIMEOUT_MS", 25000, 100),
    listTimeoutMs: readInt("LIST_TIMEOUT_MS", 10000, 100),
    toolTimeoutMs: readInt("TOOL_TIMEOUT_MS", 90000, 100),
    configToolTimeoutMs: readInt("CONFIG_TOOL_TIMEOUT_MS", 120000, 100),
    maxPendingResponses: readInt("MAX_PENDING_RESPONSES", 1000, 10),
    initializedSettleMs: readInt("INITIALIZED_SETTLE_MS", 400, 0),
    wizardDefaults: loadWizardDefaults(),
  };
}

export function loadServerFile(serverConfigPath: string): ServerFile {
  let raw = "";
  try {
    raw = readFileSync(serverConfigPath, "utf8");
  } catch (error) {
    throw new Error(
      `Unable to read server config at ${serverConfigPath}. Copy config/server.example.yaml to this path and edit it.`,
      { cause: error },
    );
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new Error(`Invalid YAML in ${serverConfigPath}.`, { cause: error });
  }

  return serverFileSchema.parse(parsed);
}
