import { join } from 'path';
import { DeplockConfig } from '../types/index.js';
import { readJsonOrJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_REGISTRY_DIR, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';

/**
 * Project configuration for deplock
 * Supports both JSON and JSONC formats
 */

// Default configuration values
const DEFAULT_CONFIG: DeplockConfig = {
  registry: DEFAULT_REGISTRY_DIR,
  lockfile: FILE_PATTERNS.LOCKFILE,
  allowPrerelease: false
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: DeplockConfig | null = null;
  private configPath: string | null = null;

  constructor(
    private readonly projectRoot: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Find the existing config file (supports both .json and .jsonc)
   * Returns the path to the existing config file, or null if none exists
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
      const path = join(this.projectRoot, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration, falling back to defaults when no file exists
   */
  async load(): Promise<DeplockConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    let config: DeplockConfig = { ...DEFAULT_CONFIG };

    if (configPath) {
      logger.debug(`Loading config from: ${configPath}`);
      let fileConfig: unknown;
      try {
        fileConfig = await readJsonOrJsoncFile(configPath);
      } catch (error) {
        throw new ConfigError(
          `Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`,
          { configPath }
        );
      }
      this.configPath = configPath;
      config = { ...config, ...validateConfig(fileConfig, configPath) };
    } else {
      logger.debug('Config file not found, using defaults');
    }

    const registryOverride = this.env[ENV_VARS.REGISTRY];
    if (registryOverride && registryOverride.trim() !== '') {
      logger.debug(`Registry overridden by ${ENV_VARS.REGISTRY}: ${registryOverride}`);
      config.registry = registryOverride.trim();
    }

    this.config = config;
    return config;
  }

  /**
   * Get a configuration value
   */
  async get<K extends keyof DeplockConfig>(key: K): Promise<DeplockConfig[K]> {
    const config = await this.load();
    return config[key];
  }

  /**
   * Path of the config file that was loaded, if any
   */
  getConfigFilePath(): string | null {
    return this.configPath;
  }
}

/**
 * Check the fields a config file may set. Unknown fields are ignored.
 */
export function validateConfig(value: unknown, configPath: string): Partial<DeplockConfig> {
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid configuration in ${configPath}: expected an object`, { configPath });
  }

  const result: Partial<DeplockConfig> = {};

  for (const key of ['registry', 'lockfile'] as const) {
    const field = value[key];
    if (field === undefined) continue;
    if (typeof field !== 'string' || field.trim() === '') {
      throw new ConfigError(`Invalid configuration in ${configPath}: '${key}' must be a non-empty string`, { configPath });
    }
    result[key] = field;
  }

  const allowPrerelease = value.allowPrerelease;
  if (allowPrerelease !== undefined) {
    if (typeof allowPrerelease !== 'boolean') {
      throw new ConfigError(`Invalid configuration in ${configPath}: 'allowPrerelease' must be a boolean`, { configPath });
    }
    result.allowPrerelease = allowPrerelease;
  }

  return result;
}
