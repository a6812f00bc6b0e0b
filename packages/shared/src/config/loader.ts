import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import yaml from 'js-yaml';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { ConfigError } from '../errors';
import { logger as defaultLogger, type Logger } from '../logger';
import { ConfigSchema, type Config } from './schema';

export interface ConfigOptions {
  configPath?: string; // CLI override
  env?: NodeJS.ProcessEnv; // Environment variables
  logger?: Logger;
}

export interface LoadedConfig {
  config: Config;
  /** File the configuration came from; undefined when built-in defaults were used */
  source: string | undefined;
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const configHome = env.XDG_CONFIG_HOME || path.join(env.HOME || os.homedir(), '.config');
  return path.join(configHome, 'projpick', 'config.json');
}

export class ConfigLoader {
  static parse(content: string, filePath: string): unknown {
    const ext = path.extname(filePath).toLowerCase();
    if (ext === '.yaml' || ext === '.yml') {
      try {
        return yaml.load(content) ?? {};
      } catch (error: unknown) {
        if (error instanceof yaml.YAMLException) {
          throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
            cause: error,
          });
        }
        throw error;
      }
    }

    const errors: ParseError[] = [];
    const parsed: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
    if (errors.length > 0) {
      const issues = errors
        .map((e) => `- offset ${e.offset}: ${printParseErrorCode(e.error)}`)
        .join('\n');
      throw new ConfigError(`Error parsing JSON file: ${filePath}\n${issues}`);
    }
    return parsed ?? {};
  }

  static validate(raw: unknown, source: string): Config {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed (${source}):\n${issues}`);
    }
    return result.data;
  }

  static load(options: ConfigOptions = {}): LoadedConfig {
    const env = options.env ?? process.env;
    const log = options.logger ?? defaultLogger;
    const explicit = options.configPath !== undefined;
    const filePath = options.configPath ?? defaultConfigPath(env);

    if (!fs.existsSync(filePath)) {
      if (explicit) {
        throw new ConfigError(`Config file not found: ${filePath}`);
      }
      log.warn(`No config at ${filePath}, using default config`);
      return { config: this.validate({}, 'defaults'), source: undefined };
    }

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf8');
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read config file ${filePath}: ${message}`, { cause: error });
    }

    const config = this.validate(this.parse(content, filePath), filePath);
    log.debug(`Loaded config from ${filePath}`);
    return { config, source: filePath };
  }
}
