import { chalk } from "zx";
import { ExecutionFailedError, ExecutorTimeoutError, TriageError } from "../errors.ts";
import { BatchExecutor } from "../executor.ts";
import { Script } from "../lib.ts";
import { ZxProcessRunner } from "../process-runner.ts";

export default class ExecuteScript extends Script {
  static override command = "execute";
  static override description = "Run the test engine over existing stable and flakey partitions";
  static override usage = "execute <stable-list> <flakey-list>";

  override async fn(): Promise<number> {
    const [stable, flakey] = this.positionals;
    if (!stable || !flakey) {
      throw new TriageError(`Usage: ${ExecuteScript.usage}`);
    }

    const executor = new BatchExecutor({
      settings: this.settings,
      root: this.config.root,
      processRunner: new ZxProcessRunner(this.logger),
      logger: this.logger,
    });

    try {
      const result = await executor.execute(stable, flakey);
      this.logger.log(`${chalk.green("PASSED")} ${result.testPaths.join(" ")}`);
      return 0;
    } catch (error) {
      if (error instanceof ExecutionFailedError || error instanceof ExecutorTimeoutError) {
        this.logger.log(`${chalk.red("FAILED")} execution failed: ${error.message}`);
        return 1;
      }
      throw error;
    }
  }
}
