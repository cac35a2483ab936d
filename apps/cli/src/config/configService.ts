import process from 'node:process';

import { ConfigError } from './configError.js';
import { ConfigStore } from './configStore.js';
import type { CredentialVault } from './credentialVault.js';
import type {
  CliConfig,
  LogSettings,
  ProfileConfig,
  ProfileSummary,
  ResolvedProfile,
  UpsertProfileInput,
} from './types.js';

export { ConfigError };

export const API_KEY_ENV = 'STRUCT_EXTRACT_API_KEY';

export class ConfigService {
  private readonly store: ConfigStore;

  private readonly vault: CredentialVault;

  private readonly env: NodeJS.ProcessEnv;

  private cache?: CliConfig;

  constructor(store: ConfigStore, vault: CredentialVault, env: NodeJS.ProcessEnv = process.env) {
    this.store = store;
    this.vault = vault;
    this.env = env;
  }

  async initialize(): Promise<void> {
    await this.store.ensureInitialized();
  }

  async ensureConfigFile(): Promise<{ created: boolean; path: string }> {
    const created = await this.store.ensureInitialized();
    return { created, path: this.store.getPath() };
  }

  async getProfile(name?: string): Promise<ResolvedProfile> {
    const config = await this.loadConfig();
    const profileName = name ?? config.defaultProfile;
    const profile = config.profiles[profileName];

    if (!profile) {
      throw new ConfigError(`profile '${profileName}' does not exist`);
    }

    const storedKey = profile.vaultKeyId
      ? await this.vault.get(profile.vaultKeyId)
      : undefined;
    const envKey = this.env[API_KEY_ENV]?.trim();

    return {
      name: profileName,
      provider: profile.provider,
      endpoint: profile.endpoint,
      model: profile.model,
      region: profile.region,
      logFile: profile.logFile ?? config.log.defaultLogFile,
      vaultKeyId: profile.vaultKeyId,
      apiKey: envKey || storedKey,
    };
  }

  /** The profile as stored, without the log or API key fallbacks of `getProfile`. */
  async getStoredProfile(name: string): Promise<ProfileConfig | undefined> {
    const config = await this.loadConfig();
    const profile = config.profiles[name];
    return profile ? { ...profile } : undefined;
  }

  async upsertProfile(name: string, input: UpsertProfileInput): Promise<void> {
    const config = await this.loadConfig();
    const previous = config.profiles[name];

    config.profiles[name] = {
      provider: input.provider,
      endpoint: input.endpoint,
      model: input.model,
      region: input.region,
      logFile: input.logFile,
      vaultKeyId: input.vaultKeyId ?? previous?.vaultKeyId,
      updatedAt: new Date().toISOString(),
    };

    if (input.apiKey) {
      const vaultKey = input.vaultKeyId ?? `profile:${name}`;
      await this.vault.store(vaultKey, input.apiKey);
      config.profiles[name].vaultKeyId = vaultKey;
    }

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

  async getLogSettings(): Promise<LogSettings> {
    const config = await this.loadConfig();
    return config.log;
  }

  async listProfiles(): Promise<ProfileSummary[]> {
    const config = await this.loadConfig();
    return Object.entries(config.profiles).map(([name, profile]) => ({
      name,
      provider: profile.provider,
      endpoint: profile.endpoint,
      model: profile.model,
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
