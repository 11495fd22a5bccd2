import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { randomBytes } from "node:crypto";
import type { Classification, Classifier } from "./classifier.ts";
import { InputListMissingError } from "./errors.ts";
import type { Logger } from "./lib.ts";

/** Names the splitter gives its partition files. */
export const PARTITION_FILE_PATTERN = /_(stable|flakey)_[0-9a-f]{12}\.list$/;

export function isCommentLine(line: string): boolean {
  return line.trim().startsWith("#");
}

export interface PartitionSet {
  stablePath: string;
  flakeyPath: string;
  stableCount: number;
  flakeyCount: number;
  /** Removes both partition files unless they are kept for debugging. */
  dispose(): Promise<void>;
}

export interface ListSplitterOptions {
  classifier: Classifier;
  partitionDir: string;
  /** Keep partition files on dispose. */
  debug?: boolean;
  logger?: Logger;
}

async function createExclusive(filePath: string): Promise<fs.promises.FileHandle> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  return fs.promises.open(filePath, "wx");
}

async function removeFiles(...paths: string[]): Promise<void> {
  await Promise.all(paths.map((file) => fs.promises.rm(file, { force: true })));
}

export class ListSplitter {
  private readonly classifier: Classifier;
  private readonly partitionDir: string;
  private readonly debug: boolean;
  private readonly logger?: Logger;

  constructor(options: ListSplitterOptions) {
    this.classifier = options.classifier;
    this.partitionDir = options.partitionDir;
    this.debug = options.debug ?? false;
    this.logger = options.logger;
  }

  partitionPaths(listPath: string): Record<Classification, string> {
    const stem = path.basename(listPath).replace(/\.list$/, "");
    const id = randomBytes(6).toString("hex");
    return {
      stable: path.join(this.partitionDir, `${stem}_stable_${id}.list`),
      flakey: path.join(this.partitionDir, `${stem}_flakey_${id}.list`),
    };
  }

  /**
   * Partition the identifiers of `listPath` into two new files, stable
   * first. Order within each partition follows the input.
   */
  async split(listPath: string): Promise<PartitionSet> {
    this.logger?.debug("Starting to split into stable and flakey tests");
    const paths = this.partitionPaths(listPath);

    const stable = await createExclusive(paths.stable);
    let flakey: fs.promises.FileHandle;
    try {
      flakey = await createExclusive(paths.flakey);
    } catch (error) {
      await stable.close();
      await removeFiles(paths.stable);
      throw error;
    }

    const handles: Record<Classification, fs.promises.FileHandle> = { stable, flakey };
    const counts: Record<Classification, number> = { stable: 0, flakey: 0 };

    const readErrors = new Set<unknown>();
    try {
      const input = fs.createReadStream(listPath, { encoding: "utf-8" });
      input.on("error", (error) => {
        readErrors.add(error);
      });
      const opened = new Promise<void>((resolve, reject) => {
        input.once("open", () => resolve());
        input.once("error", (error) => reject(new InputListMissingError(listPath, error)));
      });
      await opened;

      const lines = readline.createInterface({ input, crlfDelay: Infinity });
      for await (const line of lines) {
        if (isCommentLine(line)) continue;
        const classification = await this.classifier.classify(line);
        await handles[classification].write(`${line}\n`);
        counts[classification] += 1;
      }
    } catch (error) {
      await Promise.all([stable.close(), flakey.close()]);
      await removeFiles(paths.stable, paths.flakey);
      // Opened but unreadable, e.g. a directory.
      if (readErrors.has(error)) {
        throw new InputListMissingError(listPath, error);
      }
      throw error;
    }

    await Promise.all([stable.close(), flakey.close()]);
    this.logger?.debug(
      `Finished splitting test list into stable: ${paths.stable} and flakey: ${paths.flakey} tests`,
    );

    const debug = this.debug;
    const logger = this.logger;
    return {
      stablePath: paths.stable,
      flakeyPath: paths.flakey,
      stableCount: counts.stable,
      flakeyCount: counts.flakey,
      async dispose() {
        if (debug) {
          logger?.debug(`Keeping ${paths.stable} and ${paths.flakey}`);
          return;
        }
        await removeFiles(paths.stable, paths.flakey);
      },
    };
  }
}
