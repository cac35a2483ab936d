import { homedir } from 'node:os';
import { dirname, join } from 'node:path';

export function resolveConfigFilePath(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  if (env.STRUCT_EXTRACT_CONFIG_PATH) {
    return env.STRUCT_EXTRACT_CONFIG_PATH;
  }

  if (platform === 'win32') {
    const base = env.APPDATA ?? join(homedir(), 'AppData', 'Roaming');
    return join(base, 'StructExtract', 'config.json');
  }

  const base = env.XDG_CONFIG_HOME ?? join(homedir(), '.config');
  return join(base, 'struct-extract', 'config.json');
}

export function resolveCredentialsFilePath(configFilePath: string): string {
  return join(dirname(configFilePath), 'credentials.json');
}
