import { ConfigError } from './configError.js';
import { ConfigStore } from './configStore.js';
import { DEFAULT_MODEL } from './defaults.js';
import type {
  CliConfig,
  ProfileSummary,
  ResolvedProfile,
  UpsertProfileInput,
} from './types.js';

export { ConfigError };

export interface ProfileProvider {
  getProfile(name?: string): Promise<ResolvedProfile>;
}

export class ConfigService implements ProfileProvider {
  private readonly store: ConfigStore;

  private cache?: CliConfig;

  constructor(store: ConfigStore) {
    this.store = store;
  }

  async ensureConfigFile(): Promise<{ created: boolean; path: string }> {
    const created = await this.store.ensureInitialized();
    this.cache = undefined;
    return { created, path: this.store.getPath() };
  }

  async getProfile(name?: string): Promise<ResolvedProfile> {
    const config = await this.loadConfig();
    const profileName = name ?? config.defaultProfile;
    const profile = config.profiles[profileName];

    if (!profile) {
      throw new ConfigError(`profile '${profileName}' does not exist`);
    }

    return {
      name: profileName,
      region: profile.region,
      model: profile.model,
      maxTokens: profile.maxTokens,
      logFile: profile.logFile ?? config.log.defaultLogFile,
      log: config.log,
    };
  }

  /** Creates the profile or updates only the fields given in `input`. */
  async upsertProfile(name: string, input: UpsertProfileInput): Promise<void> {
    const config = await this.loadConfig();
    const existing = config.profiles[name];

    config.profiles[name] = {
      region: input.region ?? existing?.region,
      model: input.model ?? existing?.model ?? DEFAULT_MODEL,
      maxTokens: input.maxTokens ?? existing?.maxTokens,
      logFile: input.logFile ?? existing?.logFile,
      updatedAt: new Date().toISOString(),
    };

    if (!config.defaultProfile) {
      config.defaultProfile = name;
    }

    await this.persist(config);
  }

  async setDefaultProfile(name: string): Promise<void> {
    const config = await this.loadConfig();
    if (!config.profiles[name]) {
      throw new ConfigError(`profile '${name}' does not exist`);
    }

    config.defaultProfile = name;
    await this.persist(config);
  }

  async listProfiles(): Promise<ProfileSummary[]> {
    const config = await this.loadConfig();
    return Object.entries(config.profiles).map(([name, profile]) => ({
      name,
      region: profile.region,
      model: profile.model,
      maxTokens: profile.maxTokens,
      updatedAt: profile.updatedAt,
      isDefault: name === config.defaultProfile,
    }));
  }

  private async loadConfig(): Promise<CliConfig> {
    if (!this.cache) {
      this.cache = await this.store.load();
    }
    return this.cache;
  }

  private async persist(config: CliConfig): Promise<void> {
    this.cache = config;
    await this.store.save(config);
  }
}
