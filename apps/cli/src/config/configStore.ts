import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { ConfigError } from './configError.js';
import { DEFAULT_MODEL, DEFAULT_REGION } from './defaults.js';
import type { CliConfig, LogSettings, ProfileConfig } from './types.js';

function createDefaultConfig(): CliConfig {
  return {
    schemaVersion: 1,
    defaultProfile: 'default',
    profiles: {
      default: {
        region: DEFAULT_REGION,
        model: DEFAULT_MODEL,
        updatedAt: new Date(0).toISOString(),
      },
    },
    log: {
      append: true,
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw new ConfigError(`${field} must be a string`);
}

function optionalPositiveInteger(value: unknown, field: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
    return value;
  }
  throw new ConfigError(`${field} must be a positive integer`);
}

function parseProfile(name: string, value: unknown): ProfileConfig {
  if (!isRecord(value) || typeof value.model !== 'string') {
    throw new ConfigError(`profile '${name}' must define a model`);
  }

  return {
    region: optionalString(value.region, `profile '${name}' region`),
    model: value.model,
    maxTokens: optionalPositiveInteger(value.maxTokens, `profile '${name}' maxTokens`),
    logFile: optionalString(value.logFile, `profile '${name}' logFile`),
    updatedAt: optionalString(value.updatedAt, `profile '${name}' updatedAt`) ?? new Date(0).toISOString(),
  };
}

function parseLogSettings(value: unknown): LogSettings {
  if (value === undefined) {
    return { append: true };
  }
  if (!isRecord(value)) {
    throw new ConfigError('log must be an object');
  }
  return {
    defaultLogFile: optionalString(value.defaultLogFile, 'log.defaultLogFile'),
    append: value.append !== false,
  };
}

export function parseConfig(content: string): CliConfig {
  let document: unknown;

  try {
    document = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`config file is not valid JSON (${reason})`);
  }

  if (!isRecord(document) || !isRecord(document.profiles)) {
    throw new ConfigError('config file must contain a profiles object');
  }

  const profiles: Record<string, ProfileConfig> = {};
  for (const [name, profile] of Object.entries(document.profiles)) {
    profiles[name] = parseProfile(name, profile);
  }

  return {
    schemaVersion: typeof document.schemaVersion === 'number' ? document.schemaVersion : 1,
    defaultProfile: optionalString(document.defaultProfile, 'defaultProfile') ?? 'default',
    profiles,
    log: parseLogSettings(document.log),
  };
}

export class ConfigStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  getPath(): string {
    return this.filePath;
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  async ensureInitialized(): Promise<boolean> {
    if (await this.exists()) {
      return false;
    }

    await this.save(createDefaultConfig());
    return true;
  }

  /** Falls back to the built-in defaults, without writing, when no file exists yet. */
  async load(): Promise<CliConfig> {
    if (!(await this.exists())) {
      return createDefaultConfig();
    }

    const content = await readFile(this.filePath, 'utf-8');
    return parseConfig(content);
  }

  async save(config: CliConfig): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
  }
}
