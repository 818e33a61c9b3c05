import { describe, it } from "node:test";
import assert from "node:assert";
import { listDevices, pickDevice, resolveDeviceSelection, runOnDevices } from "../cli/devices";
import { RpcClient } from "../rpc/client";
import { ToolClient } from "../tools/tool-client";
import { createSilentLogger } from "../logger";
import type { JsonObject } from "../types";
import { deviceServer, FakeChild } from "./helpers/fake-child";
import { scriptedPrompter } from "./helpers/scripted-prompter";

function json(data: JsonObject) {
  return { content: [{ type: "json", data }] };
}

function connect(tools: Record<string, (args: JsonObject) => unknown>) {
  const child = new FakeChild();
  child.respondWith(deviceServer(tools));
  const rpc = new RpcClient(child, { logger: createSilentLogger() });
  return { rpc, tools: new ToolClient(rpc, 1000) };
}

describe("listDevices", () => {
  it("should read the devices array", async () => {
    const { rpc, tools } = connect({ list_devices: () => json({ devices: ["R1", "R2", 3] }) });
    assert.deepStrictEqual(await listDevices(tools, () => undefined), ["R1", "R2"]);
    rpc.close();
  });

  it("should read device names from JSON in raw", async () => {
    const { rpc, tools } = connect({
      list_devices: () => ({ content: [{ type: "text", text: JSON.stringify({ raw: '["R7","R8"]' }) }] }),
    });
    assert.deepStrictEqual(await listDevices(tools, () => undefined), ["R7", "R8"]);
    rpc.close();
  });

  it("should warn and return an empty list when the tool fails", async () => {
    const { rpc, tools } = connect({
      list_devices: () => {
        throw new Error("inventory not loaded");
      },
    });
    const printed: string[] = [];

    assert.deepStrictEqual(await listDevices(tools, (line) => printed.push(line)), []);
    assert.strictEqual(printed.length, 1);
    assert.ok(printed[0]?.startsWith("⚠️  list_devices failed: Tool 'list_devices' error:"));
    rpc.close();
  });
});

describe("resolveDeviceSelection", () => {
  const names = ["R1", "R2", "R3"];

  it("should cancel on q", () => {
    assert.deepStrictEqual(resolveDeviceSelection("q", names, true), { selection: { mode: "cancel" } });
  });

  it("should select all on empty input or 'a' when allowed", () => {
    assert.deepStrictEqual(resolveDeviceSelection("", names, true), {
      selection: { mode: "all", names },
    });
    assert.deepStrictEqual(resolveDeviceSelection("ALL", names, true), {
      selection: { mode: "all", names },
    });
  });

  it("should pick the first device on empty input when all is not allowed", () => {
    assert.deepStrictEqual(resolveDeviceSelection("", names, false), {
      selection: { mode: "single", device: "R1" },
    });
  });

  it("should pick by number or name", () => {
    assert.deepStrictEqual(resolveDeviceSelection("3", names, true), {
      selection: { mode: "single", device: "R3" },
    });
    assert.deepStrictEqual(resolveDeviceSelection("R2", names, true), {
      selection: { mode: "single", device: "R2" },
    });
  });

  it("should default to the first device with a warning otherwise", () => {
    assert.deepStrictEqual(resolveDeviceSelection("12", names, true), {
      selection: { mode: "single", device: "R1" },
      warning: "⚠️  Out of range; defaulting to first device.",
    });
    assert.deepStrictEqual(resolveDeviceSelection("core-sw", names, true), {
      selection: { mode: "single", device: "R1" },
      warning: "⚠️  Not recognized; defaulting to first device.",
    });
  });
});

describe("pickDevice", () => {
  it("should fall back to the server default device when none are listed", async () => {
    const { rpc, tools } = connect({ list_devices: () => json({ devices: [] }) });
    const { prompter, printed, asked } = scriptedPrompter([]);

    assert.deepStrictEqual(await pickDevice(prompter, tools, { allowAll: true, label: "Selection" }), {
      mode: "single",
      device: null,
    });
    assert.deepStrictEqual(printed, [
      "⚠️  Could not retrieve device list from server; using server default device.",
    ]);
    assert.deepStrictEqual(asked, []);
    rpc.close();
  });

  it("should list devices and read the selection", async () => {
    const { rpc, tools } = connect({ list_devices: () => json({ devices: ["R1", "R2"] }) });
    const { prompter, printed, asked } = scriptedPrompter(["2"]);

    assert.deepStrictEqual(await pickDevice(prompter, tools, { allowAll: false, label: "Device" }), {
      mode: "single",
      device: "R2",
    });
    assert.deepStrictEqual(printed.slice(0, 3), ["\n🗂️  Devices:", "  1. R1", "  2. R2"]);
    assert.deepStrictEqual(asked, ["Device: "]);
    rpc.close();
  });
});

describe("runOnDevices", () => {
  it("should aggregate results and keep going past failing devices", async () => {
    const { rpc, tools } = connect({
      get_interfaces: (args) => {
        if (args.device === "R2") {
          throw new Error("SSH timeout");
        }
        return json({ device: args.device, raw: `raw-${String(args.device)}`, parsed: [{ name: "Ethernet0/0" }] });
      },
    });
    const seen: string[] = [];

    const summary = await runOnDevices(tools, "get_interfaces", ["R1", "R2"], 1000, (device, result) => {
      seen.push(result instanceof Error ? `${device}:error` : `${device}:ok`);
    });

    assert.deepStrictEqual(seen, ["R1:ok", "R2:error"]);
    assert.deepStrictEqual(summary.raw, ["=== R1 ===\nraw-R1\n"]);
    assert.deepStrictEqual(summary.parsed, [
      { device: "R1", parsed: [{ name: "Ethernet0/0" }] },
      {
        device: "R2",
        error: `Tool 'get_interfaces' error: ${JSON.stringify({ code: -32000, message: "SSH timeout" })}`,
      },
    ]);
    rpc.close();
  });
});
