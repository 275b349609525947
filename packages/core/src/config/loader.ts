import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  ConfigSchema,
  isPlainObject,
  type Config,
  type ConfigInput,
} from '@northstar/shared';

export interface ConfigOptions {
  configPath?: string; // explicit config file
  flags?: ConfigInput; // caller overrides, highest precedence
  cwd?: string; // directory holding .northstar.yaml
  env?: NodeJS.ProcessEnv; // environment variables
}

type Layer = Record<string, unknown>;

/** Environment variables that override individual settings. */
const ENV_OVERRIDES: Array<{ name: string; section: string; key: string }> = [
  { name: 'NORTHSTAR_TARGET_REPO', section: 'execution', key: 'defaultRepo' },
  { name: 'NORTHSTAR_TARGET_FILE', section: 'execution', key: 'defaultFile' },
  { name: 'NORTHSTAR_BASE_BRANCH', section: 'execution', key: 'defaultBaseBranch' },
];

export class ConfigLoader {
  static loadYaml(filePath: string): Layer {
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      const parsed: unknown = yaml.load(content);
      if (parsed === undefined || parsed === null) {
        return {};
      }
      if (!isPlainObject(parsed)) {
        throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
      }
      return parsed;
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  static mergeConfigs(target: Layer, source: Layer): Layer {
    const output: Layer = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static envLayer(env: NodeJS.ProcessEnv): Layer {
    let layer: Layer = {};
    for (const { name, section, key } of ENV_OVERRIDES) {
      const value = env[name];
      if (value) {
        layer = this.mergeConfigs(layer, { [section]: { [key]: value } });
      }
    }
    return layer;
  }

  /**
   * Loads configuration, lowest to highest precedence:
   * defaults < ~/.northstar/config.yaml < <cwd>/.northstar.yaml < explicit file
   * < NORTHSTAR_* environment overrides < flags.
   * Secrets left unset are then read from the variables named by
   * `merge.apiKeyEnv` and `github.tokenEnv`.
   */
  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.northstar/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), '.northstar', 'config.yaml'));

    // 2. Repo config: <cwd>/.northstar.yaml
    const repoConfig = this.loadYaml(path.join(cwd, '.northstar.yaml'));

    // 3. Explicit config file (if provided)
    let explicitConfig: Layer = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    let merged: Layer = {};
    for (const layer of [userConfig, repoConfig, explicitConfig, this.envLayer(env), options.flags ?? {}]) {
      merged = this.mergeConfigs(merged, layer);
    }

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    const config = result.data;
    return {
      ...config,
      merge: { ...config.merge, apiKey: config.merge.apiKey ?? env[config.merge.apiKeyEnv] },
      github: { ...config.github, token: config.github.token ?? env[config.github.tokenEnv] },
    };
  }
}
