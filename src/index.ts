#!/usr/bin/env node
import { createInterface } from "node:readline/promises";
import { loadAppConfig, loadServerFile } from "./config";
import { createLogger } from "./logger";
import { ConsoleSession, connect } from "./cli/session";
import { Prompter } from "./cli/prompts";
import type { RpcClient } from "./rpc/client";

async function main(): Promise<number> {
  const config = loadAppConfig();
  const serverFile = loadServerFile(config.serverConfigPath);
  const logger = createLogger(config.logLevel);

  const input = createInterface({ input: process.stdin, output: process.stdout });
  const prompter = new Prompter(input, (line) => console.log(line));
  let rpc: RpcClient | undefined;
  let inputClosed = false;
  let interrupted = false;

  const shutdown = (code: number) => {
    rpc?.close();
    if (!inputClosed) {
      inputClosed = true;
      input.close();
    }
    return code;
  };

  // Ctrl-C and end of input both stop the console.
  const ended = new Promise<number>((resolve) => {
    input.once("SIGINT", () => {
      interrupted = true;
      console.log("\n🛑 Interrupted.");
      resolve(shutdown(130));
    });
    input.once("close", () => {
      inputClosed = true;
      resolve(shutdown(0));
    });
  });

  const session = async (): Promise<number> => {
    // Server lines carrying WARNING/ERROR go straight to the operator.
    const connected = await connect(config, serverFile, logger, (line) => console.log(line));
    rpc = connected.rpc;
    if (inputClosed) {
      return shutdown(interrupted ? 130 : 0);
    }
    console.log(`✅ Connected to MCP server: ${connected.serverName}`);

    if (connected.tools.length === 0) {
      console.log("❌ No tools exposed by server.");
      return shutdown(1);
    }
    console.log(`🧰 Tools available: ${connected.tools.map((tool) => tool.name).join(", ")}`);

    await new ConsoleSession(connected.rpc, prompter, config).run(connected.tools);
    return shutdown(0);
  };

  const running = session();
  // A pending prompt rejects once input closes; that outcome is already settled by `ended`.
  void running.catch((error: unknown) => logger.debug({ err: error }, "session ended after shutdown"));

  try {
    return await Promise.race([running, ended]);
  } catch (error) {
    if (interrupted || inputClosed) {
      return interrupted ? 130 : 0;
    }
    console.log(`💥 Fatal error: ${error instanceof Error ? error.message : String(error)}`);
    logger.error({ err: error }, "console stopped");
    return shutdown(2);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exit(2);
  });
