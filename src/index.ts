import process from "node:process";
import { chalk, minimist } from "zx";
import { CLI_OPTIONS, Logger, Runner, createConfig, type ScriptConstructor } from "./lib.ts";

import Execute from "./scripts/execute.ts";
import Split from "./scripts/split.ts";
import Test from "./scripts/test.ts";

const scripts: Record<string, ScriptConstructor> = {
  execute: Execute,
  split: Split,
  test: Test,
};

function printCommandsTable(log: (line: string) => void): void {
  const commands = Object.values(scripts).sort((a, b) => a.command.localeCompare(b.command));
  const width = Math.max(...commands.map((cmd) => cmd.usage.length), "USAGE".length);

  log(chalk.cyan(chalk.bold(`  ${"USAGE".padEnd(width)}  DESCRIPTION`)));
  for (const cmd of commands) {
    log(`  ${chalk.yellow(cmd.usage.padEnd(width))}  ${cmd.description}`);
  }
}

export default async function main(
  _argv: string[] = process.argv,
  _env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const argv = _argv.slice(2);
  const args = minimist(argv, CLI_OPTIONS);

  if (args.help) {
    console.log(chalk.green("Usage: flake-triage <command> [options]"));
    console.log();
    printCommandsTable(console.log);
    return 0;
  }

  const config = createConfig({
    rootDir: typeof args.root === "string" && args.root ? args.root : undefined,
    processEnv: Object.fromEntries(
      Object.entries(_env).filter((entry): entry is [string, string] => entry[1] !== undefined),
    ),
    overrides: {
      ...(args.debug ? { debug: true } : {}),
      ...(args.green === false ? { greenMode: false } : {}),
    },
  });
  const logger = new Logger(config);

  const name = String(args._[0] ?? "test");
  const ScriptClass = scripts[name];
  if (!ScriptClass) {
    logger.error(`Unknown command "${name}"`);
    printCommandsTable((line) => logger.log(line));
    return 1;
  }

  // Commands read their positionals after the command name.
  const runner = new Runner(config, args._[0] === undefined ? ["test", ...argv] : argv, logger);

  try {
    return await runner.run(ScriptClass);
  } catch (error) {
    if (error instanceof Error) {
      logger.error(`\n${error.message}\n`, error.stack);
    } else {
      logger.error(`\n${String(error)}\n`);
    }
    throw error;
  }
}
