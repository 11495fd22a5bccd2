import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { SpecMismatchError, TriageError } from "../errors.ts";
import { describeError, type CollectorSource, type ReportInfo, type TestFile, type TestItem } from "./types.ts";

const ScenarioSchema = z.record(z.string(), z.unknown());
const SpecDocumentSchema = z.record(z.string(), ScenarioSchema);

export type Scenario = z.infer<typeof ScenarioSchema>;

/** Keys are always strings, so scalar values compare by their text. */
function matchesKey(key: string, value: unknown): boolean {
  if (typeof value === "number" || typeof value === "boolean") {
    return key === String(value);
  }
  return key === value;
}

const byKey = <T>([a]: [string, T], [b]: [string, T]) => (a < b ? -1 : a > b ? 1 : 0);

/** A named scenario whose every key must equal its value. */
export class YamlItem implements TestItem {
  constructor(
    readonly name: string,
    readonly path: string,
    readonly spec: Scenario,
  ) {}

  async run(): Promise<void> {
    for (const [key, value] of Object.entries(this.spec).sort(byKey)) {
      if (!matchesKey(key, value)) {
        throw new SpecMismatchError(key, value);
      }
    }
  }

  reportInfo(): ReportInfo {
    return { path: this.path, line: 0, message: `usecase: ${this.name}` };
  }

  describeFailure(error: unknown): string {
    if (error instanceof SpecMismatchError) {
      return [
        "usecase execution failed",
        ` spec failed: ${JSON.stringify(error.key)}: ${JSON.stringify(error.value)}`,
        "   no further details known at this point.",
      ].join("\n");
    }
    return describeError(error);
  }
}

export class YamlFile implements TestFile {
  constructor(readonly path: string) {}

  async collect(): Promise<TestItem[]> {
    const contents = await fs.promises.readFile(this.path, "utf-8");
    const document: unknown = parseYaml(contents) ?? {};
    const parsed = SpecDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new TriageError(
        `${this.path} must map scenario names to key/value pairs: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      );
    }
    return Object.entries(parsed.data)
      .sort(byKey)
      .map(([name, spec]) => new YamlItem(name, this.path, spec));
  }
}

export class YamlSource implements CollectorSource {
  readonly name = "yaml";

  matches(filePath: string): boolean {
    const name = path.basename(filePath);
    return name.endsWith(".yaml") && name.startsWith("test");
  }

  open(filePath: string): TestFile {
    return new YamlFile(filePath);
  }
}
