import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, DigestConfigSchema, type DigestConfig, type DigestConfigInput } from '@treedigest/shared';

export const USER_CONFIG_DIR = '.treedigest';
export const USER_CONFIG_FILE = 'config.yaml';
export const PROJECT_CONFIG_FILE = '.treedigest.yaml';

export interface ConfigOptions {
  configPath?: string; // CLI override
  flags?: Partial<DigestConfigInput>; // CLI flags
  cwd?: string; // Directory searched for the project config
}

type ConfigRecord = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output = { ...target };

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

  static load(options: ConfigOptions = {}): DigestConfig {
    const cwd = options.cwd || process.cwd();

    // 1. User config: ~/.treedigest/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), USER_CONFIG_DIR, USER_CONFIG_FILE));

    // 2. Project config: <cwd>/.treedigest.yaml
    const projectConfig = this.loadYaml(path.join(cwd, PROJECT_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 4. CLI flags (passed as partial config)
    const flagConfig: ConfigRecord = { ...options.flags };

    // Merge in order of precedence: flags > explicit > project > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, projectConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, flagConfig);

    const result = DigestConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }

    return result.data;
  }
}
