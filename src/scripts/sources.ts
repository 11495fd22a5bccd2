import type { Classifier } from "../classifier.ts";
import { TestListSource } from "../collector/list-source.ts";
import type { CollectorSource } from "../collector/types.ts";
import { YamlSource } from "../collector/yaml-source.ts";
import type { ProcessRunner } from "../process-runner.ts";
import type { Runner } from "../lib.ts";

export interface SourceSeams {
  classifier?: Classifier;
  processRunner?: ProcessRunner;
}

export function createSources(runner: Runner, seams: SourceSeams = {}): CollectorSource[] {
  const { config, logger } = runner;
  return [
    new TestListSource({
      settings: config.settings,
      root: config.root,
      logger,
      ...seams,
    }),
    new YamlSource(),
  ];
}
