import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { ConfigError } from './configError.js';
import { cliConfigSchema, type CliConfig } from './types.js';

function createDefaultConfig(): CliConfig {
  return {
    schemaVersion: 1,
    defaultProfile: 'default',
    profiles: {
      default: {
        provider: 'openai',
        endpoint: '',
        model: 'llama3',
        updatedAt: new Date(0).toISOString(),
      },
    },
    log: {
      append: true,
    },
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

  async ensureInitialized(): Promise<boolean> {
    try {
      await access(this.filePath);
      return false;
    } catch {
      await this.save(createDefaultConfig());
      return true;
    }
  }

  async load(): Promise<CliConfig> {
    const content = await readFile(this.filePath, 'utf-8');

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`config file ${this.filePath} is not valid JSON: ${message}`);
    }

    const parsed = cliConfigSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`config file ${this.filePath} is invalid: ${issues}`);
    }

    return parsed.data;
  }

  async save(config: CliConfig): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(config, null, 2), 'utf-8');
  }
}
