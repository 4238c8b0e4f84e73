import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  ConfigSchema,
  MENDER_DIR,
  isRecord,
  type Config,
  type ConfigInput,
} from '@mender/shared';

export const REPO_CONFIG_FILE = '.mender.yaml';

export interface ConfigOptions {
  /** --config file */
  configPath?: string;
  /** Values from CLI flags, applied last */
  flags?: ConfigInput;
  /** Directory holding the repo config (the run target) */
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export function userConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, MENDER_DIR, 'config.yaml');
}

export class ConfigLoader {
  static loadYaml(filePath: string): Record<string, unknown> {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`);
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) return {};
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  /** Deep-merges plain objects; arrays and primitives from `source` replace. */
  static mergeConfigs(
    target: Record<string, unknown>,
    source: Record<string, unknown>,
  ): Record<string, unknown> {
    const output: Record<string, unknown> = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;
      const targetValue = output[key];
      output[key] =
        isRecord(sourceValue) && isRecord(targetValue)
          ? this.mergeConfigs(targetValue, sourceValue)
          : sourceValue;
    }
    return output;
  }

  /**
   * Loads and validates the effective configuration.
   *
   * Precedence, lowest first: user file, repo `.mender.yaml`, `--config`
   * file, CLI flags. `api_key_env` is resolved from `env` for providers
   * without an inline key.
   *
   * @throws {ConfigError} listing every invalid field
   */
  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;

    const layers = [
      this.loadYaml(userConfigPath(options.homeDir)),
      this.loadYaml(path.join(cwd, REPO_CONFIG_FILE)),
    ];
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      layers.push(this.loadYaml(options.configPath));
    }
    layers.push(options.flags ?? {});

    const merged = layers.reduce((acc, layer) => this.mergeConfigs(acc, layer), {});
    const result = ConfigSchema.safeParse(merged);

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const config = result.data;
    const providers: Config['providers'] = {};
    for (const [name, provider] of Object.entries(config.providers)) {
      const fromEnv = provider.api_key_env ? env[provider.api_key_env] : undefined;
      providers[name] = provider.api_key || !fromEnv ? provider : { ...provider, api_key: fromEnv };
    }
    return { ...config, providers };
  }
}
