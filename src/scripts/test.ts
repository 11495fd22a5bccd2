import path from "node:path";
import { Session } from "../collector/session.ts";
import { Script } from "../lib.ts";
import { createSources } from "./sources.ts";

export default class TestScript extends Script {
  static override command = "test";
  static override description = "Collect test lists and YAML specs and run them";
  static override usage = "test [dir]";

  override async fn(): Promise<number> {
    const [dir = "."] = this.positionals;
    const session = new Session(createSources(this.runner), this.logger);
    const report = await session.run(path.resolve(this.config.root, dir));
    return report.exitCode;
  }
}
