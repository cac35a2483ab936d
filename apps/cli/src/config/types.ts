import { z } from 'zod';

export const PROVIDERS = ['openai', 'bedrock'] as const;

export type Provider = (typeof PROVIDERS)[number];

export const profileConfigSchema = z.object({
  provider: z.enum(PROVIDERS).default('openai'),
  endpoint: z.string(),
  model: z.string(),
  region: z.string().optional(),
  logFile: z.string().optional(),
  vaultKeyId: z.string().optional(),
  updatedAt: z.string(),
});

export const cliConfigSchema = z.object({
  schemaVersion: z.literal(1),
  defaultProfile: z.string(),
  profiles: z.record(profileConfigSchema),
  log: z.object({
    defaultLogFile: z.string().optional(),
    append: z.boolean(),
  }),
});

export type ProfileConfig = z.infer<typeof profileConfigSchema>;

export type CliConfig = z.infer<typeof cliConfigSchema>;

export type LogSettings = CliConfig['log'];

export interface ProfileSummary {
  name: string;
  provider: Provider;
  endpoint: string;
  model: string;
  updatedAt: string;
  isDefault: boolean;
}

export interface UpsertProfileInput {
  provider: Provider;
  endpoint: string;
  model: string;
  region?: string;
  logFile?: string;
  vaultKeyId?: string;
  apiKey?: string;
}

export interface ResolvedProfile {
  name: string;
  provider: Provider;
  endpoint: string;
  model: string;
  region?: string;
  logFile?: string;
  vaultKeyId?: string;
  apiKey?: string;
}

export function isProvider(value: string): value is Provider {
  return value === 'openai' || value === 'bedrock';
}
