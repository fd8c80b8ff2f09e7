/**
 * Configuration loader with hierarchy support
 * Priority: CLI flags > env vars > project config > global config > defaults
 */

import { ConfigSchema, PartialConfigSchema, TrustModelSchema } from './schemas.js';
import type { Config, PartialConfig } from './schemas.js';
import { ConfigurationError } from '@gpgpipe/core';
import type { IFileSystem } from '@gpgpipe/core';
import yaml from 'yaml';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import type { ZodError } from 'zod';
import { logger } from '@/shared/utils/logger.js';

export const CONFIG_DIR_NAME = '.gpgpipe';
export const CONFIG_FILE_NAME = 'config.yml';

export interface ConfigLoadOptions {
  projectRoot?: string;
  cliFlags?: PartialConfig;
}

export interface ConfigLoaderOptions {
  /**
   * Directory holding the global .gpgpipe folder (default: os.homedir())
   */
  homeDir?: string;
  /**
   * Environment to read GPGPIPE_* variables from (default: process.env)
   */
  env?: NodeJS.ProcessEnv;
}

export class ConfigLoader {
  constructor(
    private fs: IFileSystem,
    private options: ConfigLoaderOptions = {}
  ) {}

  /**
   * Load configuration with full hierarchy:
   * 1. Defaults
   * 2. Global (~/.gpgpipe/config.yml)
   * 3. Project (.gpgpipe/config.yml)
   * 4. Environment variables (process env, then .env)
   * 5. CLI flags
   */
  async load(options: ConfigLoadOptions = {}): Promise<Config> {
    let config: PartialConfig = {};

    const globalConfig = await this.loadConfigFile(this.getConfigPath('global'), 'global');
    if (globalConfig) {
      config = this.merge(config, globalConfig);
    }

    if (options.projectRoot) {
      const projectPath = this.getConfigPath('project', options.projectRoot);
      const projectConfig = await this.loadConfigFile(projectPath, 'project');
      if (projectConfig) {
        config = this.merge(config, projectConfig);
      }
    }

    const envConfig = await this.loadEnvConfig(options.projectRoot);
    if (envConfig) {
      config = this.merge(config, envConfig);
    }

    if (options.cliFlags) {
      config = this.merge(config, options.cliFlags);
    }

    return this.validate(config);
  }

  getDefaults(): Config {
    return ConfigSchema.parse({});
  }

  getConfigPath(scope: 'global' | 'project', projectRoot?: string): string {
    return scope === 'global'
      ? path.join(this.options.homeDir ?? os.homedir(), CONFIG_DIR_NAME, CONFIG_FILE_NAME)
      : path.join(projectRoot ?? process.cwd(), CONFIG_DIR_NAME, CONFIG_FILE_NAME);
  }

  private async loadConfigFile(
    configPath: string,
    scope: 'global' | 'project'
  ): Promise<PartialConfig | null> {
    let raw: unknown;
    try {
      if (!(await this.fs.exists(configPath))) {
        return null;
      }
      raw = yaml.parse(await this.fs.readFile(configPath));
    } catch (error) {
      logger.warn(`Failed to load ${scope} config`, { path: configPath, error });
      return null;
    }

    // Empty file
    if (raw === null || raw === undefined) {
      return null;
    }

    const result = PartialConfigSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid ${scope} config at ${configPath}: ${formatIssues(result.error)}`
      );
    }
    return result.data;
  }

  private async loadEnvConfig(projectRoot?: string): Promise<PartialConfig | null> {
    const envPath = path.join(projectRoot ?? process.cwd(), '.env');
    let fileEnv: Record<string, string> = {};
    try {
      if (await this.fs.exists(envPath)) {
        fileEnv = dotenv.parse(await this.fs.readFile(envPath));
      }
    } catch (error) {
      logger.warn('Failed to load .env config', { path: envPath, error });
    }

    // Real environment wins over the .env file
    const env = { ...fileEnv, ...(this.options.env ?? process.env) };
    const gpg: NonNullable<PartialConfig['gpg']> = {};

    if (env.GPGPIPE_GPG_PATH) {
      gpg.path = env.GPGPIPE_GPG_PATH;
    }
    if (env.GPGPIPE_HOMEDIR) {
      gpg.homeDir = env.GPGPIPE_HOMEDIR;
    }
    if (env.GPGPIPE_TIMEOUT_MS) {
      const timeoutMs = Number(env.GPGPIPE_TIMEOUT_MS);
      if (!Number.isInteger(timeoutMs) || timeoutMs < 0) {
        throw new ConfigurationError(
          `GPGPIPE_TIMEOUT_MS must be a non-negative integer, got "${env.GPGPIPE_TIMEOUT_MS}"`
        );
      }
      gpg.timeoutMs = timeoutMs;
    }
    if (env.GPGPIPE_TRUST_MODEL) {
      const trustModel = TrustModelSchema.safeParse(env.GPGPIPE_TRUST_MODEL.toLowerCase());
      if (!trustModel.success) {
        throw new ConfigurationError(
          `GPGPIPE_TRUST_MODEL must be one of ${TrustModelSchema.options.join(', ')}, ` +
            `got "${env.GPGPIPE_TRUST_MODEL}"`
        );
      }
      gpg.trustModel = trustModel.data;
    }

    return Object.keys(gpg).length > 0 ? { gpg } : null;
  }

  private merge(base: PartialConfig, override: PartialConfig): PartialConfig {
    return {
      gpg: { ...base.gpg, ...override.gpg },
      logging: { ...base.logging, ...override.logging },
    };
  }

  async save(
    config: PartialConfig,
    scope: 'global' | 'project',
    projectRoot?: string
  ): Promise<void> {
    const configPath = this.getConfigPath(scope, projectRoot);
    const configDir = path.dirname(configPath);

    if (!(await this.fs.exists(configDir))) {
      await this.fs.mkdir(configDir, { recursive: true });
    }

    const yamlContent = yaml.stringify(PartialConfigSchema.parse(config));
    await this.fs.writeFile(configPath, yamlContent);
    logger.info(`Config saved to ${configPath}`);
  }

  validate(config: unknown): Config {
    const result = ConfigSchema.safeParse(config);
    if (!result.success) {
      throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
    }
    return result.data;
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
}
