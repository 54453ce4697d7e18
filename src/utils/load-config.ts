import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { ConverterConfig, PartialConverterConfig } from "../types";
import {
  ConverterConfigSchema,
  PartialConverterConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("runoff2tex", { suffix: "" });

export interface ConfigError {
  path: string;
  error: unknown;
}

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConverterConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return ConverterConfigSchema.parse(parsed);
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialConverterConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialConverterConfigSchema.parse(parsed);
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: ConverterConfig,
  override: PartialConverterConfig,
): ConverterConfig {
  return {
    input: { ...base.input, ...override.input },
    document: { ...base.document, ...override.document },
    translation: { ...base.translation, ...override.translation },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ConverterConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A layer that fails to load or validate is skipped and reported in `errors`
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
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
  return join(getConfigDirectory(), "config.json");
}
