import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { HarvestConfig, PartialHarvestConfig, ConfigError } from "../types";
import { HarvestConfigSchema, PartialHarvestConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// OS-specific paths (follows XDG spec on Linux)
const paths = envPaths("page-image-harvester", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<HarvestConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return HarvestConfigSchema.parse(parsed);
}

async function loadPartialConfig(path: string): Promise<PartialHarvestConfig> {
  const content = await readFile(path, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialHarvestConfigSchema.parse(parsed);
}

async function loadUserConfig(): Promise<PartialHarvestConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: HarvestConfig,
  override: PartialHarvestConfig,
): HarvestConfig {
  return {
    input: override.input ?? base.input,
    images: { ...base.images, ...override.images },
    request: { ...base.request, ...override.request },
    storage: { ...base.storage, ...override.storage },
    concurrency: { ...base.concurrency, ...override.concurrency },
    parser: { ...base.parser, ...override.parser },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: HarvestConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * Files that fail to load or validate are skipped and reported in `errors`
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
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
