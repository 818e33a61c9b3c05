import { describe, it } from "node:test";
import assert from "node:assert";
import { once } from "node:events";
import { setTimeout as sleep } from "node:timers/promises";
import { startProcess } from "../rpc/supervisor";
import { RpcClient } from "../rpc/client";
import { LaunchError } from "../rpc/errors";

const MISSING = "definitely-not-a-tool-server-7f3a";

describe("startProcess", () => {
  it("should reject with LaunchError when the executable does not exist", async () => {
    await assert.rejects(startProcess({ executable: MISSING, args: [] }), (error: unknown) => {
      assert.ok(error instanceof LaunchError);
      assert.strictEqual(error.command, MISSING);
      assert.ok(error.message.startsWith(`Failed to start tool server '${MISSING}'`));
      return true;
    });
  });
});

describe("ProcessHandle", () => {
  it("should pass the parent environment plus overrides and tolerate terminate after exit", async () => {
    const previous = process.env.DEVICE_CONSOLE_PARENT;
    process.env.DEVICE_CONSOLE_PARENT = "inherited";
    try {
      const handle = await startProcess({
        executable: process.execPath,
        args: [
          "-e",
          "process.stdout.write(`${process.env.DEVICE_CONSOLE_PARENT}|${process.env.DEVICE_CONSOLE_OVERRIDE}`)",
        ],
        env: { DEVICE_CONSOLE_OVERRIDE: "from-command" },
      });

      let output = "";
      handle.stdout.on("data", (chunk: string) => {
        output += chunk;
      });
      await once(handle.stdout, "end");
      for (let attempt = 0; attempt < 100 && handle.isAlive(); attempt += 1) {
        await sleep(20);
      }

      assert.strictEqual(output, "inherited|from-command");
      assert.strictEqual(handle.isAlive(), false);
      assert.doesNotThrow(() => handle.terminate());
      assert.doesNotThrow(() => handle.terminate());
    } finally {
      if (previous === undefined) {
        delete process.env.DEVICE_CONSOLE_PARENT;
      } else {
        process.env.DEVICE_CONSOLE_PARENT = previous;
      }
    }
  });
});

describe("RpcClient.launch", () => {
  it("should propagate LaunchError", async () => {
    await assert.rejects(RpcClient.launch({ executable: MISSING, args: ["--inventory", "devices.yaml"] }), LaunchError);
  });
});
