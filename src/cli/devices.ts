import type { ToolClient } from "../tools/tool-client";
import type { DisplayResult } from "../tools/normalize";
import { isJsonObject } from "../tools/normalize";
import type { Prompter } from "./prompts";

const LIST_DEVICES_TIMEOUT_MS = 30000;

export type DeviceSelection =
  | { mode: "cancel" }
  | { mode: "all"; names: string[] }
  // null device means "let the server pick its default"
  | { mode: "single"; device: string | null };

export interface PickOptions {
  allowAll: boolean;
  label: string;
}

export interface DeviceRunSummary {
  raw: string[];
  parsed: Array<{ device: string; parsed: unknown } | { device: string; error: string }>;
}

function readNameList(value: unknown): string[] | null {
  if (isJsonObject(value) && Array.isArray(value.devices)) {
    return value.devices.filter((name): name is string => typeof name === "string");
  }
  if (Array.isArray(value)) {
    return value.filter((name): name is string => typeof name === "string");
  }
  return null;
}

/**
 * Device names from the server's `list_devices` tool, `[]` on any failure.
 * Accepts `{"devices": [...]}` directly or JSON text in `raw`.
 */
export async function listDevices(tools: ToolClient, print: (line: string) => void): Promise<string[]> {
  let payload: Record<string, unknown>;
  try {
    payload = await tools.call("list_devices", {}, LIST_DEVICES_TIMEOUT_MS);
  } catch (error) {
    print(`⚠️  list_devices failed: ${error instanceof Error ? error.message : String(error)}`);
    return [];
  }

  if (Array.isArray(payload.devices)) {
    return readNameList(payload) ?? [];
  }
  if (typeof payload.raw === "string" && payload.raw) {
    try {
      return readNameList(JSON.parse(payload.raw)) ?? [];
    } catch {
      return [];
    }
  }
  return [];
}

export function resolveDeviceSelection(
  input: string,
  names: string[],
  allowAll: boolean,
): { selection: DeviceSelection; warning?: string } {
  const choice = input.trim();
  const first = names[0] ?? null;

  if (["q", "quit", "exit"].includes(choice.toLowerCase())) {
    return { selection: { mode: "cancel" } };
  }
  if (allowAll && (choice === "" || ["a", "all"].includes(choice.toLowerCase()))) {
    return { selection: { mode: "all", names: [...names] } };
  }
  if (choice === "") {
    return { selection: { mode: "single", device: first } };
  }
  if (/^\d+$/.test(choice)) {
    const picked = names[Number(choice) - 1];
    if (picked !== undefined) {
      return { selection: { mode: "single", device: picked } };
    }
    return {
      selection: { mode: "single", device: first },
      warning: "⚠️  Out of range; defaulting to first device.",
    };
  }
  if (names.includes(choice)) {
    return { selection: { mode: "single", device: choice } };
  }
  return {
    selection: { mode: "single", device: first },
    warning: "⚠️  Not recognized; defaulting to first device.",
  };
}

export async function pickDevice(
  prompter: Prompter,
  tools: ToolClient,
  options: PickOptions,
): Promise<DeviceSelection> {
  const names = await listDevices(tools, prompter.print);
  if (names.length === 0) {
    prompter.print("⚠️  Could not retrieve device list from server; using server default device.");
    return { mode: "single", device: null };
  }

  prompter.print("\n🗂️  Devices:");
  names.forEach((name, index) => prompter.print(`  ${index + 1}. ${name}`));
  prompter.print(
    options.allowAll
      ? "\nPick a device number or name, press ENTER / 'a' for all, or 'q' to cancel."
      : "\nPick a device number or name (ENTER picks the first) or 'q' to cancel.",
  );

  const { selection, warning } = resolveDeviceSelection(
    await prompter.ask(`${options.label}: `),
    names,
    options.allowAll,
  );
  if (warning) {
    prompter.print(warning);
  }
  return selection;
}

/**
 * Runs one tool against each device in turn. A failing device is recorded and
 * the batch continues.
 */
export async function runOnDevices(
  tools: ToolClient,
  toolName: string,
  names: string[],
  timeoutMs: number,
  onResult: (device: string, result: DisplayResult | Error) => void,
): Promise<DeviceRunSummary> {
  const summary: DeviceRunSummary = { raw: [], parsed: [] };
  for (const device of names) {
    try {
      const result = await tools.callForDisplay(toolName, { device }, timeoutMs);
      onResult(device, result);
      const raw = typeof result.raw === "string" ? result.raw : "";
      summary.raw.push(`=== ${device} ===\n${raw}\n`);
      summary.parsed.push({ device, parsed: result.parsed });
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      onResult(device, failure);
      summary.parsed.push({ device, error: failure.message });
    }
  }
  return summary;
}
