import debug from "debug";
import { type ExecaChildProcess, execa } from "execa";
import type { CommandOptions, CommandResult, CommandRunner } from "../types";

const log = debug("makeshift:shell");

const SHUTDOWN_GRACE_PERIOD_MS = 1000;

/**
 * Runs commands through the platform shell (/bin/sh on Unix, cmd.exe on
 * Windows), one at a time. Non-zero exits are returned, not thrown.
 */
export class ExecaCommandRunner implements CommandRunner {
  private current: ExecaChildProcess | undefined;

  async run(command: string, options: CommandOptions = {}): Promise<CommandResult> {
    const capture = options.capture ?? false;
    log(`Spawning${capture ? " (captured)" : ""}: ${command}`);

    const proc = execa(command, {
      buffer: capture,
      cwd: options.cwd ?? process.cwd(),
      env: options.env,
      reject: false,
      shell: true,
      stdin: "inherit",
      stdout: "pipe",
      stderr: "pipe",
    });
    this.current = proc;

    if (!capture) {
      proc.stdout?.on("data", (data: Buffer) => {
        options.onStdout?.(data.toString());
      });
      proc.stderr?.on("data", (data: Buffer) => {
        options.onStderr?.(data.toString());
      });
    }

    try {
      const result = await proc;
      log(`Finished with exit code ${result.exitCode}`, result.signal ?? "");
      return {
        stderr: capture ? result.stderr : "",
        stdout: capture ? result.stdout : "",
        ...(result.signal
          ? { signal: result.signal }
          : { exitCode: result.exitCode }),
      };
    } finally {
      this.current = undefined;
    }
  }

  kill(): void {
    if (!this.current) {
      return;
    }
    log("Stopping running subprocess");
    this.current.kill("SIGTERM", {
      forceKillAfterTimeout: SHUTDOWN_GRACE_PERIOD_MS,
    });
  }
}
