import { spawn } from "node:child_process";
import type { ChildProcessWithoutNullStreams } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import type { Logger } from "../logger";
import type { CommandSpec } from "../types";
import { LaunchError } from "./errors";

const KILL_GRACE_MS = 2000;

/**
 * What the RPC client needs from the tool server process. Tests substitute
 * an in-process implementation built from PassThrough streams.
 */
export interface ChildHandle {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable | null;
  readonly pid: number | undefined;
  isAlive(): boolean;
  terminate(): void;
}

class ProcessHandle implements ChildHandle {
  private exited = false;

  constructor(
    private readonly child: ChildProcessWithoutNullStreams,
    private readonly logger?: Logger,
  ) {
    child.on("exit", (exitCode, signal) => {
      this.exited = true;
      this.logger?.info({ pid: child.pid, exitCode, signal }, "tool server exited");
    });
  }

  get stdin(): Writable {
    return this.child.stdin;
  }

  get stdout(): Readable {
    return this.child.stdout;
  }

  get stderr(): Readable {
    return this.child.stderr;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    return !this.exited && this.child.exitCode === null && this.child.signalCode === null;
  }

  terminate(): void {
    if (!this.isAlive()) {
      return;
    }
    try {
      this.child.kill("SIGTERM");
    } catch (error) {
      this.logger?.debug({ err: error }, "SIGTERM failed");
      return;
    }
    setTimeout(() => {
      if (this.isAlive()) {
        this.child.kill("SIGKILL");
      }
    }, KILL_GRACE_MS).unref();
  }
}

/**
 * Spawns the tool server with the parent environment plus `command.env`.
 * Resolves once the OS reports the process started.
 */
export async function startProcess(command: CommandSpec, logger?: Logger): Promise<ChildHandle> {
  const child = spawn(command.executable, command.args, {
    env: {
      ...process.env,
      ...command.env,
    },
    cwd: command.cwd,
    stdio: "pipe",
    shell: false,
  });

  await new Promise<void>((resolve, reject) => {
    const onSpawn = () => {
      child.off("error", onError);
      resolve();
    };
    const onError = (error: Error) => {
      child.off("spawn", onSpawn);
      reject(new LaunchError(command.executable, { cause: error }));
    };
    child.once("spawn", onSpawn);
    child.once("error", onError);
  });

  child.stdout.setEncoding("utf8");
  child.stderr.setEncoding("utf8");
  child.stdin.setDefaultEncoding("utf8");
  // Late spawn-time errors (e.g. kill failures) must not crash the console.
  child.on("error", (error) => {
    logger?.error({ err: error, pid: child.pid }, "tool server process error");
  });

  logger?.info(
    { pid: child.pid, executable: command.executable, args: command.args },
    "tool server started",
  );

  return new ProcessHandle(child, logger);
}
