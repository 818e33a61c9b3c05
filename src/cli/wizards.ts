import type { ToolClient } from "../tools/tool-client";
import type { JsonObject, WizardDefaults } from "../types";
import { promptAddress } from "./address";
import { pickDevice } from "./devices";
import type { Prompter } from "./prompts";

export interface WizardContext {
  prompter: Prompter;
  tools: ToolClient;
  defaults: WizardDefaults;
}

const INTERFACE_TIP =
  "ℹ️  Tip: On your device, use names like 'Ethernet0/0', 'Ethernet0/1', 'Ethernet0/2', 'Ethernet0/3'.";

async function review(prompter: Prompter, args: JsonObject): Promise<boolean> {
  prompter.print("\n📋 Review arguments:");
  prompter.print(JSON.stringify(args, null, 2));
  return await prompter.confirm("Proceed with these settings?", true);
}

/**
 * Collects `set_interface_ip` arguments. Returns null when cancelled.
 */
export async function setInterfaceIpWizard(ctx: WizardContext): Promise<JsonObject | null> {
  const { prompter, defaults } = ctx;
  while (true) {
    prompter.print("\n🔧 set_interface_ip — guided setup");
    const selection = await pickDevice(prompter, ctx.tools, { allowAll: false, label: "Device" });
    if (selection.mode === "cancel") {
      return null;
    }

    prompter.print(INTERFACE_TIP);
    const iface = await prompter.text("Interface", defaults.interface);
    const address = await promptAddress(prompter, defaults.ip, defaults.mask);
    const replace = await prompter.confirm("Replace existing IP on interface?", defaults.replace);
    const noShutdown = await prompter.confirm("Send 'no shutdown'?", defaults.noShutdown);
    const save = await prompter.confirm("Save config (write memory)?", defaults.save);
    const dryRun = await prompter.confirm("Dry run (preview only)?", defaults.dryRun);

    const args: JsonObject = {
      interface: iface,
      ip: address.ip,
      replace,
      no_shutdown: noShutdown,
      save,
      dry_run: dryRun,
    };
    if (address.mask) {
      args.mask = address.mask;
    }
    if (selection.mode === "single" && selection.device) {
      args.device = selection.device;
    }

    if (await review(prompter, args)) {
      return args;
    }
  }
}

/**
 * Collects `create_loopback` arguments. Returns null when cancelled.
 */
export async function createLoopbackWizard(ctx: WizardContext): Promise<JsonObject | null> {
  const { prompter, defaults } = ctx;
  while (true) {
    prompter.print("\n🔧 create_loopback — guided setup");
    const selection = await pickDevice(prompter, ctx.tools, { allowAll: false, label: "Device" });
    if (selection.mode === "cancel") {
      return null;
    }

    const loopbackId = await prompter.integer("Loopback ID", defaults.loopbackId, 0);
    const address = await promptAddress(prompter, defaults.loopbackIp);
    const description = await prompter.text("Description", defaults.loopbackDescription, true);
    const save = await prompter.confirm("Save config (write memory)?", defaults.save);
    const dryRun = await prompter.confirm("Dry run (preview only)?", defaults.dryRun);

    const args: JsonObject = {
      loopback_id: loopbackId,
      ip: address.ip,
      description,
      save,
      dry_run: dryRun,
    };
    if (address.mask) {
      args.mask = address.mask;
    }
    if (selection.mode === "single" && selection.device) {
      args.device = selection.device;
    }

    if (await review(prompter, args)) {
      return args;
    }
  }
}

/**
 * `set_interface_ip` arguments that put a failed loopback's address on a
 * physical interface instead. The change is applied, not previewed.
 */
export function buildLoopbackFallbackArgs(loopbackArgs: JsonObject, iface: string): JsonObject {
  const fallback: JsonObject = {
    ip: loopbackArgs.ip,
    replace: true,
    no_shutdown: true,
    save: false,
    dry_run: false,
  };
  if (loopbackArgs.mask) {
    fallback.mask = loopbackArgs.mask;
  }
  if (loopbackArgs.device) {
    fallback.device = loopbackArgs.device;
  }
  fallback.interface = iface;
  return fallback;
}
