import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "../errors.ts";

export const DEFAULT_CONFIG_FILE = "triage.yml";

/** Longest timer Node accepts, in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

const RateLimitSchema = z.object({
  capacity: z.number().int().positive(),
  leak_rate: z.number().positive(),
});

const SettingsFileSchema = z
  .object({
    executor_path: z.string().min(1).default("./ESTest.pl"),
    executor_interpreter: z.string().default("perl"),
    suite_timeout: z.number().positive().max(MAX_TIMEOUT_SECONDS).default(1000),
    test_list_filename_prefix: z.string().min(1).default("crypto_tests.list"),
    test_root: z.string().min(1).default("tests/root/cryptoserver/"),
    partition_dir: z.string().min(1).optional(),
    log_dir: z.string().min(1).default("logs/"),
    suite_name: z.string().min(1).default("Crypto"),
    green_mode: z.boolean().default(true),
    external_classifier_url: z.string().url().default("http://localhost:8000/"),
    classifier_timeout: z.number().positive().max(MAX_TIMEOUT_SECONDS).default(5),
    classifier_rate_limit: RateLimitSchema.optional(),
    debug: z.boolean().default(false),
  })
  .strict();

type SettingsFile = z.infer<typeof SettingsFileSchema>;

export interface RateLimitSettings {
  capacity: number;
  leakRate: number;
}

export interface TriageSettings {
  configPath: string | null;
  executorPath: string;
  executorInterpreter: string;
  /** Upper bound for one engine invocation, in milliseconds. */
  suiteTimeoutMs: number;
  testListFilenamePrefix: string;
  testRoot: string;
  /** Absolute directory the partition files are written to. */
  partitionDir: string;
  logDir: string;
  suiteName: string;
  greenMode: boolean;
  classifierUrl: string;
  classifierTimeoutMs: number;
  classifierRateLimit: RateLimitSettings | null;
  debug: boolean;
}

const truthy = (value: string) => value.toLowerCase() === "true";

const EnvOverridesSchema = z.object({
  EXECUTOR_PATH: z.string().min(1).optional(),
  SUITE_TIMEOUT: z.coerce.number().positive().max(MAX_TIMEOUT_SECONDS).optional(),
  GREEN_MODE: z.string().min(1).transform(truthy).optional(),
  CLASSIFIER_URL: z.string().url().optional(),
  TRIAGE_DEBUG: z.string().min(1).transform(truthy).optional(),
});

function readEnvOverrides(processEnv: Record<string, string | undefined>) {
  // Empty values count as unset.
  const present = Object.fromEntries(
    Object.entries(processEnv).filter(([, value]) => value !== undefined && value !== ""),
  );
  const result = EnvOverridesSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      `Invalid environment overrides: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseYamlFile(filePath: string): unknown {
  try {
    const contents = fs.readFileSync(filePath, "utf-8");
    return contents ? (parseYaml(contents) ?? {}) : {};
  } catch (error) {
    throw new ConfigError(
      `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}

/**
 * Resolve triage settings for a project root.
 *
 * `triage.yml` is optional; when it is absent every setting takes its
 * default. Environment variables win over the file.
 */
export function loadSettings(
  rootDir: string,
  processEnv: Record<string, string | undefined> = {},
  configPath?: string,
): TriageSettings {
  const resolvedRoot = path.resolve(rootDir);
  const explicitPath = configPath ?? (processEnv.TRIAGE_CONFIG || undefined);
  const resolvedConfigPath = explicitPath
    ? path.resolve(resolvedRoot, explicitPath)
    : path.join(resolvedRoot, DEFAULT_CONFIG_FILE);

  let document: unknown = {};
  let loadedFrom: string | null = null;
  if (fs.existsSync(resolvedConfigPath)) {
    document = parseYamlFile(resolvedConfigPath);
    loadedFrom = resolvedConfigPath;
  } else if (explicitPath) {
    throw new ConfigError(`Missing configuration at ${resolvedConfigPath}`);
  }

  const parsed = SettingsFileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration in ${resolvedConfigPath}: ${formatIssues(parsed.error)}`,
    );
  }

  return normalizeSettings(
    parsed.data,
    readEnvOverrides(processEnv),
    resolvedRoot,
    loadedFrom,
  );
}

function normalizeSettings(
  file: SettingsFile,
  env: z.infer<typeof EnvOverridesSchema>,
  root: string,
  configPath: string | null,
): TriageSettings {
  const suiteTimeout = env.SUITE_TIMEOUT ?? file.suite_timeout;
  const rateLimit = file.classifier_rate_limit;

  return {
    configPath,
    executorPath: env.EXECUTOR_PATH ?? file.executor_path,
    executorInterpreter: file.executor_interpreter,
    suiteTimeoutMs: Math.round(suiteTimeout * 1000),
    testListFilenamePrefix: file.test_list_filename_prefix,
    testRoot: file.test_root,
    partitionDir: path.resolve(root, file.partition_dir ?? file.test_root),
    logDir: file.log_dir,
    suiteName: file.suite_name,
    greenMode: env.GREEN_MODE ?? file.green_mode,
    classifierUrl: env.CLASSIFIER_URL ?? file.external_classifier_url,
    classifierTimeoutMs: Math.round(file.classifier_timeout * 1000),
    classifierRateLimit: rateLimit
      ? { capacity: rateLimit.capacity, leakRate: rateLimit.leak_rate }
      : null,
    debug: env.TRIAGE_DEBUG ?? file.debug,
  };
}
