import { $ } from "zx";
import type { Logger } from "./lib.ts";

export type ExitStatus =
  | {
      kind: "completed";
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      stdout: string;
      stderr: string;
    }
  | {
      kind: "timed-out";
      timeoutMs: number;
      stdout: string;
      stderr: string;
    };

export interface RunOptions {
  cwd: string;
  timeoutMs: number;
}

/**
 * Runs one executable script to completion or until the timeout kills it.
 */
export interface ProcessRunner {
  run(scriptPath: string, options: RunOptions): Promise<ExitStatus>;
}

export class ZxProcessRunner implements ProcessRunner {
  constructor(private readonly logger?: Logger) {}

  async run(scriptPath: string, { cwd, timeoutMs }: RunOptions): Promise<ExitStatus> {
    const shell = $({ cwd, nothrow: true, quiet: true, verbose: false });
    const proc = shell`${scriptPath}`;

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      this.logger?.warn(`Killing ${scriptPath} after ${timeoutMs}ms`);
      proc.kill("SIGKILL").catch((error: unknown) => {
        this.logger?.error(`Failed to kill ${scriptPath}: ${String(error)}`);
      });
    }, timeoutMs);

    try {
      const output = await proc;
      if (timedOut) {
        return {
          kind: "timed-out",
          timeoutMs,
          stdout: output.stdout,
          stderr: output.stderr,
        };
      }
      return {
        kind: "completed",
        exitCode: output.exitCode,
        signal: output.signal,
        stdout: output.stdout,
        stderr: output.stderr,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
