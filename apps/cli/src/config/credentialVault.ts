import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { z } from 'zod';

import { ConfigError } from './configError.js';

export interface CredentialVault {
  store(key: string, value: string): Promise<void>;
  get(key: string): Promise<string | undefined>;
  delete(key: string): Promise<void>;
}

const secretsSchema = z.record(z.string());

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Keeps secrets in a JSON file readable only by the current user.
 */
export class FileVault implements CredentialVault {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async store(key: string, value: string): Promise<void> {
    const secrets = await this.read();
    secrets[key] = value;
    await this.write(secrets);
  }

  async get(key: string): Promise<string | undefined> {
    const secrets = await this.read();
    return secrets[key];
  }

  async delete(key: string): Promise<void> {
    const secrets = await this.read();
    if (!(key in secrets)) {
      return;
    }
    delete secrets[key];
    await this.write(secrets);
  }

  private async read(): Promise<Record<string, string>> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new ConfigError(`credentials file ${this.filePath} is not valid JSON`);
    }

    const parsed = secretsSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigError(`credentials file ${this.filePath} must map names to strings`);
    }
    return parsed.data;
  }

  private async write(secrets: Record<string, string>): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(secrets, null, 2), { encoding: 'utf-8', mode: 0o600 });
    await chmod(this.filePath, 0o600);
  }
}

export class InMemoryVault implements CredentialVault {
  private readonly data = new Map<string, string>();

  async store(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async get(key: string): Promise<string | undefined> {
    return this.data.get(key);
  }

  async delete(key: string): Promise<void> {
    this.data.delete(key);
  }
}

export function createCredentialVault(filePath: string): CredentialVault {
  return new FileVault(filePath);
}
