import path from "node:path";
import { chalk } from "zx";
import { createClassifier } from "../classifier.ts";
import { TriageError } from "../errors.ts";
import { Script } from "../lib.ts";
import { ListSplitter } from "../splitter.ts";

export default class SplitScript extends Script {
  static override command = "split";
  static override description = "Split a test list into stable and flakey partitions";
  static override usage = "split <list>";

  override async fn(): Promise<number> {
    const [list] = this.positionals;
    if (!list) {
      throw new TriageError(`Usage: ${SplitScript.usage}`);
    }

    // The caller owns these files, so they are never disposed here.
    const splitter = new ListSplitter({
      classifier: createClassifier(this.settings, this.logger),
      partitionDir: this.settings.partitionDir,
      logger: this.logger,
    });
    const partitions = await splitter.split(path.resolve(this.config.root, list));

    this.logger.log(`${chalk.green("stable")} (${partitions.stableCount}): ${partitions.stablePath}`);
    this.logger.log(`${chalk.yellow("flakey")} (${partitions.flakeyCount}): ${partitions.flakeyPath}`);
    return 0;
  }
}
