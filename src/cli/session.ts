import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../logger";
import { RpcClient } from "../rpc/client";
import { ToolClient } from "../tools/tool-client";
import type { DisplayResult } from "../tools/normalize";
import type { AppConfig, JsonObject, ServerFile, ToolDescriptor } from "../types";
import { pickDevice, runOnDevices } from "./devices";
import { selectTool } from "./menu";
import type { Prompter } from "./prompts";
import { renderToolResult } from "./render";
import { buildLoopbackFallbackArgs, createLoopbackWizard, setInterfaceIpWizard } from "./wizards";

const LIST_DEVICES_TIMEOUT_MS = 60000;

export interface ConnectedSession {
  rpc: RpcClient;
  serverName: string;
  tools: ToolDescriptor[];
}

/**
 * Launches the tool server and runs the handshake: initialize, the
 * initialized notification, then tools/list.
 */
export async function connect(
  config: AppConfig,
  serverFile: ServerFile,
  logger: Logger,
  onDiagnostic: (line: string) => void,
): Promise<ConnectedSession> {
  const rpc = await RpcClient.launch(serverFile.server, {
    logger,
    maxPendingResponses: config.maxPendingResponses,
    onDiagnostic,
  });
  try {
    const server = await rpc.initialize(
      serverFile.client,
      serverFile.protocolVersion,
      config.requestTimeoutMs,
    );
    if (config.initializedSettleMs > 0) {
      await sleep(config.initializedSettleMs);
    }
    const tools = await rpc.listTools(config.listTimeoutMs);
    return { rpc, serverName: server.name, tools };
  } catch (error) {
    rpc.close();
    throw error;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The interactive loop: pick a tool, run its flow, repeat until quit.
 */
export class ConsoleSession {
  private readonly tools: ToolClient;

  constructor(
    rpc: RpcClient,
    private readonly prompter: Prompter,
    private readonly config: AppConfig,
  ) {
    this.tools = new ToolClient(rpc, config.toolTimeoutMs);
  }

  async run(available: ToolDescriptor[]): Promise<void> {
    while (true) {
      const selected = await selectTool(this.prompter, available);
      if (!selected) {
        this.prompter.print("👋 Bye.");
        return;
      }
      await this.runTool(selected);
    }
  }

  async runTool(name: string): Promise<void> {
    switch (name) {
      case "list_devices":
        await this.runListDevices();
        return;
      case "get_interfaces":
      case "get_version":
        await this.runShowTool(name);
        return;
      case "set_interface_ip":
        await this.runSetInterfaceIp();
        return;
      case "create_loopback":
        await this.runCreateLoopback();
        return;
      default:
        this.prompter.print("No custom flow for this tool yet.");
    }
  }

  private show(name: string, data: DisplayResult): void {
    for (const line of renderToolResult(name, data)) {
      this.prompter.print(line);
    }
  }

  private async runListDevices(): Promise<void> {
    try {
      const data = await this.tools.callForDisplay("list_devices", {}, LIST_DEVICES_TIMEOUT_MS);
      if (Array.isArray(data.devices)) {
        this.prompter.print("\n🗂️  Devices:");
        data.devices.forEach((device, index) => this.prompter.print(`  ${index + 1}. ${String(device)}`));
      }
      this.show("list_devices", data);
    } catch (error) {
      this.prompter.print(`❌ Tool call failed: ${describeError(error)}`);
    }
  }

  private async runShowTool(name: "get_interfaces" | "get_version"): Promise<void> {
    const selection = await pickDevice(this.prompter, this.tools, {
      allowAll: true,
      label: "Selection",
    });
    if (selection.mode === "cancel") {
      return;
    }

    if (selection.mode === "all") {
      this.prompter.print(`\n▶️  Running '${name}' on ALL devices ...`);
      const summary = await runOnDevices(
        this.tools,
        name,
        selection.names,
        this.config.toolTimeoutMs,
        (device, result) => {
          if (result instanceof Error) {
            this.prompter.print(`❌ ${device}: ${result.message}`);
          } else {
            this.show(name, result);
          }
        },
      );
      this.prompter.print("\n=== 📦 Aggregated (all devices) ===");
      this.prompter.print("\n📡 RAW (combined):\n");
      this.prompter.print(summary.raw.join("\n"));
      this.prompter.print("\n🧾 Parsed (combined):");
      this.prompter.print(JSON.stringify(summary.parsed, null, 2));
      return;
    }

    const args: JsonObject = selection.device ? { device: selection.device } : {};
    this.prompter.print(
      `\n▶️  Running '${name}' with ${JSON.stringify(selection.device ? args : { device: "<default>" })} ...`,
    );
    try {
      this.show(name, await this.tools.callForDisplay(name, args, this.config.toolTimeoutMs));
    } catch (error) {
      this.prompter.print(`❌ Tool call failed: ${describeError(error)}`);
    }
  }

  private async runSetInterfaceIp(): Promise<void> {
    const args = await setInterfaceIpWizard(this.wizardContext());
    if (!args) {
      return;
    }
    try {
      const data = await this.tools.callForDisplay(
        "set_interface_ip",
        args,
        this.config.configToolTimeoutMs,
      );
      this.show("set_interface_ip", data);
    } catch (error) {
      this.prompter.print(`❌ Tool call failed: ${describeError(error)}`);
    }
  }

  /**
   * Two steps: create the loopback; if the server reports an error, offer to
   * apply the same address to a physical interface instead.
   */
  private async runCreateLoopback(): Promise<void> {
    const args = await createLoopbackWizard(this.wizardContext());
    if (!args) {
      return;
    }

    let created: DisplayResult;
    try {
      created = await this.tools.callForDisplay(
        "create_loopback",
        args,
        this.config.configToolTimeoutMs,
      );
    } catch (error) {
      this.prompter.print(`❌ Tool call failed: ${describeError(error)}`);
      return;
    }
    this.show("create_loopback", created);
    if (!created.error) {
      return;
    }

    this.prompter.print("\n⚠️  Loopback creation failed on the server.");
    if (!(await this.prompter.confirm("Try applying the same IP to a physical interface instead?", true))) {
      return;
    }
    this.prompter.print("ℹ️  Your platform uses names like 'Ethernet0/0' .. 'Ethernet0/3'.");
    const iface = await this.prompter.text("Interface to configure (e.g., Ethernet0/0)", "Ethernet0/0");
    const fallback = buildLoopbackFallbackArgs(args, iface);

    this.prompter.print("\n📋 Fallback arguments (set_interface_ip):");
    this.prompter.print(JSON.stringify(fallback, null, 2));
    if (!(await this.prompter.confirm("Proceed with fallback?", true))) {
      return;
    }
    try {
      const data = await this.tools.callForDisplay(
        "set_interface_ip",
        fallback,
        this.config.configToolTimeoutMs,
      );
      this.show("set_interface_ip (fallback)", data);
    } catch (error) {
      this.prompter.print(`❌ Fallback failed: ${describeError(error)}`);
    }
  }

  private wizardContext() {
    return { prompter: this.prompter, tools: this.tools, defaults: this.config.wizardDefaults };
  }
}
