import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { BenchConfigSchema, ConfigError, type BenchConfig, type BenchConfigInput } from '@configbench/shared';

export const REPO_CONFIG_FILE = '.configbench.yaml';

type ConfigLayer = Record<string, unknown>;

export interface ConfigOptions {
  configPath?: string; // explicit config file
  flags?: BenchConfigInput; // caller overrides
  cwd?: string; // directory holding the repo config
  env?: NodeJS.ProcessEnv;
}

function isLayer(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigLayer {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isLayer(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
    const output: ConfigLayer = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isLayer(sourceValue) && isLayer(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static envOverrides(env: NodeJS.ProcessEnv): ConfigLayer {
    const layer: ConfigLayer = {};
    if (env.CONFIGBENCH_JUDGE_COMMAND) {
      layer.judge = { command: env.CONFIGBENCH_JUDGE_COMMAND };
    }
    if (env.CONFIGBENCH_OUTPUT_DIR) {
      layer.output = { dir: env.CONFIGBENCH_OUTPUT_DIR };
    }
    return layer;
  }

  static load(options: ConfigOptions = {}): BenchConfig {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. Repo config: <cwd>/.configbench.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    // 2. Explicit config file
    let explicitConfig: ConfigLayer = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = this.loadYaml(options.configPath);
    }

    // 3. Environment, 4. flags
    let merged = this.mergeConfigs({}, repoConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.mergeConfigs(merged, this.envOverrides(env));
    merged = this.mergeConfigs(merged, options.flags ?? {});

    const result = BenchConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    return result.data;
  }
}
