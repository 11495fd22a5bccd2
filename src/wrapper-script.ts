import fs from "node:fs";
import path from "node:path";
import { randomBytes } from "node:crypto";
import { quote } from "zx";

export interface SuiteInvocation {
  executorPath: string;
  /** Program the engine entry point is handed to, e.g. `perl`. Empty runs it directly. */
  interpreter: string;
  flags: string[];
  testPaths: string[];
}

/**
 * The engine receives its fixed flags followed by every test path joined
 * into one space-separated argument.
 */
export function engineArguments(invocation: SuiteInvocation): string[] {
  return [...invocation.flags, invocation.testPaths.join(" ")];
}

export function renderWrapperScript(invocation: SuiteInvocation): string {
  const command = [
    ...(invocation.interpreter ? [invocation.interpreter] : []),
    invocation.executorPath,
    ...engineArguments(invocation),
  ]
    .map(quote)
    .join(" ");

  return `#!/usr/bin/env bash\nexec ${command}\n`;
}

/** A generated, executable wrapper script on disk. */
export class WrapperScript {
  private removed = false;

  private constructor(
    readonly path: string,
    readonly contents: string,
  ) {}

  static async create(dir: string, invocation: SuiteInvocation): Promise<WrapperScript> {
    const id = randomBytes(6).toString("hex");
    const scriptPath = path.join(dir, `triage_wrapper_${id}.sh`);
    const contents = renderWrapperScript(invocation);

    await fs.promises.mkdir(dir, { recursive: true });
    await fs.promises.writeFile(scriptPath, contents, { flag: "wx", mode: 0o700 });
    await fs.promises.chmod(scriptPath, 0o700);
    return new WrapperScript(scriptPath, contents);
  }

  get exists(): boolean {
    return !this.removed && fs.existsSync(this.path);
  }

  async remove(): Promise<void> {
    await fs.promises.rm(this.path, { force: true });
    this.removed = true;
  }
}
