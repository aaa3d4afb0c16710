import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { ExporterConfig, PartialExporterConfig, ConfigError } from "../types";
import { ExporterConfigSchema, PartialExporterConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("workout-exporter", { suffix: "" });

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ExporterConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return ExporterConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(configPath: string): Promise<PartialExporterConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialExporterConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: ExporterConfig,
  override: PartialExporterConfig,
): ExporterConfig {
  return {
    source: { ...base.source, ...override.source },
    rateLimit: { ...base.rateLimit, ...override.rateLimit },
    discovery: {
      ...base.discovery,
      ...override.discovery,
      rateLimit: {
        ...base.discovery.rateLimit,
        ...override.discovery?.rateLimit,
      },
    },
    retry: { ...base.retry, ...override.retry },
    export: { ...base.export, ...override.export },
    journal: { ...base.journal, ...override.journal },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ExporterConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 */
export async function loadConfig(
  custom?: string,
  userConfigPath: string = getUserConfigPath(),
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(paths.config, "config.json");
}
