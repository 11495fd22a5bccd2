import path from "node:path";
import process from "node:process";
import { z } from "zod";
import { chalk, minimist } from "zx";
import { loadSettings, type TriageSettings } from "./config/index.ts";

const BaseConfigSchema = z.object({
  root: z.string(),
  processEnv: z.record(z.string(), z.string()),
  silent: z.boolean(),
});

type BaseConfig = z.infer<typeof BaseConfigSchema>;

export interface Config extends BaseConfig {
  settings: TriageSettings;
}

export const CLI_OPTIONS = {
  boolean: ["help", "debug", "green"],
  string: ["root"],
  default: { green: true },
};

export interface CreateConfigOptions {
  rootDir?: string;
  configPath?: string;
  processEnv?: Record<string, string>;
  silent?: boolean;
  overrides?: Partial<Pick<TriageSettings, "debug" | "greenMode">>;
}

export function createConfig(options: CreateConfigOptions = {}): Config {
  const {
    rootDir = process.cwd(),
    configPath,
    processEnv = Object.fromEntries(
      Object.entries(process.env).filter(
        (entry): entry is [string, string] => entry[1] !== undefined,
      ),
    ),
    silent = false,
    overrides = {},
  } = options;

  const root = path.resolve(rootDir);
  const base = BaseConfigSchema.parse({ root, processEnv, silent });
  const settings = loadSettings(root, processEnv, configPath);

  return {
    ...base,
    settings: { ...settings, ...overrides },
  };
}

type Color = "black" | "red" | "blue" | "yellow" | "green" | "cyan" | "gray";

/**
 * Line-oriented printer for captured process output.
 */
export function createLogger(name: string, color: Color = "gray") {
  return (chunk: string, streamSource: "stdout" | "stderr" = "stdout"): void => {
    const messages = chunk.trimEnd().split("\n");
    const log = streamSource === "stdout" ? console.log : console.error;
    for (const message of messages) {
      if (!message) continue;
      log(chalk[color](`[${name}] ${message}`));
    }
  };
}

export class Logger {
  config: Config;

  constructor(config: Config) {
    this.config = config;
  }

  log(...args: unknown[]): void {
    if (this.config.silent) return;
    console.log(...args);
  }

  warn(...args: unknown[]): void {
    if (this.config.silent) return;
    console.warn(chalk.yellow(...args));
  }

  error(...args: unknown[]): void {
    if (this.config.silent) return;
    console.error(chalk.red(...args));
  }

  debug(...args: unknown[]): void {
    if (this.config.silent || !this.config.settings.debug) return;
    console.log(chalk.gray(...args));
  }
}

export abstract class Script {
  static command = "";
  static description = "";
  static usage = "";

  runner: Runner;

  constructor(runner: Runner) {
    this.runner = runner;
  }

  get config(): Config {
    return this.runner.config;
  }

  get settings(): TriageSettings {
    return this.runner.config.settings;
  }

  get logger(): Logger {
    return this.runner.logger;
  }

  /** Positional arguments after the command name. */
  get positionals(): string[] {
    const args = minimist(this.runner.argv, CLI_OPTIONS);
    return args._.slice(1).map(String);
  }

  /** Resolves to the process exit code. */
  abstract fn(): Promise<number>;
}

export type ScriptConstructor = (new (runner: Runner) => Script) &
  Pick<typeof Script, "command" | "description" | "usage">;

export class Runner {
  config: Config;
  logger: Logger;
  argv: string[];

  constructor(config: Config, argv: string[] = [], logger: Logger = new Logger(config)) {
    this.config = config;
    this.logger = logger;
    this.argv = argv;
  }

  async run(ScriptToRun: ScriptConstructor): Promise<number> {
    const message = `${chalk.bold(ScriptToRun.command)}: ${ScriptToRun.description}`;
    const line = "=".repeat(Math.round((message.length + 2) * 1.618));
    this.logger.log(chalk.magenta([line, message, line].join("\n")));

    const script = new ScriptToRun(this);
    return script.fn();
  }
}
