export interface ProfileConfig {
  region?: string;
  model: string;
  maxTokens?: number;
  logFile?: string;
  updatedAt: string;
}

export interface LogSettings {
  defaultLogFile?: string;
  append: boolean;
}

export interface CliConfig {
  schemaVersion: number;
  defaultProfile: string;
  profiles: Record<string, ProfileConfig>;
  log: LogSettings;
}

export interface ProfileSummary {
  name: string;
  region?: string;
  model: string;
  maxTokens?: number;
  updatedAt: string;
  isDefault: boolean;
}

export interface UpsertProfileInput {
  region?: string;
  model?: string;
  maxTokens?: number;
  logFile?: string;
}

export interface ResolvedProfile {
  name: string;
  region?: string;
  model: string;
  maxTokens?: number;
  logFile?: string;
  log: LogSettings;
}
