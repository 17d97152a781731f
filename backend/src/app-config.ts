/**
 * Application Config
 *
 * Loads ~/.config/study-brief/config.yaml, validated by a zod schema that
 * supplies every default. Load falls back to config.yaml.bak, then to the
 * defaults. Saves are atomic and keep the previous file as a backup.
 *
 * Environment overrides:
 * - QUIZ_SERVER_HOST: quiz answer endpoint host
 * - QUIZ_SERVER_PORT: quiz answer endpoint port
 */

import { join } from "node:path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { formatValidationError } from "@study-brief/shared";
import { createLogger } from "./logger.js";
import { getConfigDir, readWithBackupFallback, writeFileAtomic } from "./file-utils.js";

const log = createLogger("app-config");

/**
 * Config file name within the config directory.
 */
const CONFIG_FILE = "config.yaml";

// =============================================================================
// Schema
// =============================================================================

/**
 * One cron trigger: day-of-week field plus time of day.
 */
const ScheduleEntrySchema = z.object({
  /** cron day-of-week field, e.g. "mon-fri" or "mon,wed,fri" */
  dayOfWeek: z.string().min(1).default("mon-fri"),
  hour: z.number().int().min(0).max(23).default(9),
  minute: z.number().int().min(0).max(59).default(0),
});

const ScheduleSchema = z.object({
  news: z.array(ScheduleEntrySchema).default([{ dayOfWeek: "mon-fri", hour: 9, minute: 0 }]),
  quiz: z.array(ScheduleEntrySchema).default([{ dayOfWeek: "mon,wed,fri", hour: 8, minute: 0 }]),
});

const LlmSchema = z.object({
  model: z.string().min(1).default("sonnet"),
  /** Token budget for note contents in a briefing prompt */
  maxContextTokens: z.number().int().positive().default(100_000),
  /** Per-attempt timeout for briefing generation */
  timeoutSeconds: z.number().int().positive().default(120),
});

const FileSelectionSchema = z.object({
  maxFiles: z.number().int().min(1).default(20),
  /** Every Nth run is a discovery round; 0 disables them */
  discoveryInterval: z.number().int().min(0).default(5),
});

const SpacedRepetitionSchema = z.object({
  enabled: z.boolean().default(true),
  maxLevel: z.number().int().min(0).default(5),
  intervals: z
    .array(z.number().int().positive())
    .min(1, "At least one interval is required")
    .default([1, 3, 7, 14, 30, 60]),
});

const QuizSchema = z.object({
  serverHost: z.string().min(1).default("127.0.0.1"),
  /** 0 picks a free port */
  serverPort: z.number().int().min(0).max(65535).default(0),
  scoringTimeoutSeconds: z.number().int().positive().default(30),
  spacedRepetition: SpacedRepetitionSchema.default({}),
});

export const AppConfigSchema = z.object({
  inputFolders: z.array(z.string().min(1)).default([]),
  outputFolderName: z.string().min(1).default("_briefings"),
  targetExtensions: z.array(z.string().startsWith(".")).min(1).default([".md"]),
  excludePatterns: z.array(z.string()).default([]),
  schedule: ScheduleSchema.default({}),
  llm: LlmSchema.default({}),
  fileSelection: FileSelectionSchema.default({}),
  quiz: QuizSchema.default({}),
});

// =============================================================================
// Types
// =============================================================================

export type ScheduleEntry = z.infer<typeof ScheduleEntrySchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Error thrown for a config that fails validation.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// =============================================================================
// Path Resolution
// =============================================================================

/**
 * Get the absolute path to the config file.
 */
export function getConfigFilePath(): string {
  return join(getConfigDir(), CONFIG_FILE);
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Config with every default applied.
 */
export function createDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

/**
 * Validate raw config data.
 * @throws ConfigError if validation fails
 */
export function parseConfig(data: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config: ${formatValidationError(result.error)}`);
  }
  return result.data;
}

/**
 * Parse config YAML. Returns null for malformed YAML or invalid content.
 */
export function parseConfigYaml(content: string): AppConfig | null {
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Malformed config YAML: ${message}`);
    return null;
  }

  try {
    return parseConfig(data);
  } catch (error) {
    if (error instanceof ConfigError) {
      log.warn(error.message);
      return null;
    }
    throw error;
  }
}

/**
 * Apply QUIZ_SERVER_HOST / QUIZ_SERVER_PORT overrides.
 */
export function applyEnvOverrides(
  config: AppConfig,
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  let { serverHost, serverPort } = config.quiz;

  if (env.QUIZ_SERVER_HOST) {
    serverHost = env.QUIZ_SERVER_HOST;
  }

  if (env.QUIZ_SERVER_PORT) {
    const port = Number(env.QUIZ_SERVER_PORT);
    if (Number.isInteger(port) && port >= 0 && port <= 65535) {
      serverPort = port;
    } else {
      log.warn(`Ignoring invalid QUIZ_SERVER_PORT: ${env.QUIZ_SERVER_PORT}`);
    }
  }

  return { ...config, quiz: { ...config.quiz, serverHost, serverPort } };
}

// =============================================================================
// Config File Operations
// =============================================================================

/**
 * Load the config from disk, falling back to the backup and then to defaults.
 */
export async function loadConfig(configPath: string = getConfigFilePath()): Promise<AppConfig> {
  const loaded = await readWithBackupFallback(configPath, parseConfigYaml);

  if (!loaded) {
    log.info(`No usable config at ${configPath}, using defaults`);
    return applyEnvOverrides(createDefaultConfig());
  }

  log.info(`Loaded config from ${configPath}${loaded.source === "backup" ? " (backup)" : ""}`);
  return applyEnvOverrides(loaded.value);
}

/**
 * Validate and write the config, keeping the previous file as config.yaml.bak.
 * @throws ConfigError if the config is invalid
 */
export async function saveConfig(
  config: AppConfig,
  configPath: string = getConfigFilePath()
): Promise<void> {
  const validated = parseConfig(config);
  const content = yaml.dump(validated, { lineWidth: -1, noRefs: true });
  await writeFileAtomic(configPath, content, { backup: true });
  log.info(`Saved config to ${configPath}`);
}

/**
 * Write a config file holding the defaults and return them.
 */
export async function generateDefaultConfig(
  configPath: string = getConfigFilePath()
): Promise<AppConfig> {
  const config = createDefaultConfig();
  await saveConfig(config, configPath);
  log.info("Generated default config");
  return config;
}
