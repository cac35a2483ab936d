import type { ConfigService } from '../config/configService.js';
import {
  PROVIDERS,
  isProvider,
  type ProfileSummary,
  type Provider,
  type ResolvedProfile,
  type UpsertProfileInput,
} from '../config/types.js';
import { CliUsageError } from '../errors.js';
import type { CommandDescriptor, CommandResult } from '../types.js';

export interface ConfigCommandDependencies {
  configService: Pick<
    ConfigService,
    | 'listProfiles'
    | 'setDefaultProfile'
    | 'ensureConfigFile'
    | 'upsertProfile'
    | 'getProfile'
    | 'getStoredProfile'
  >;
}

const DEFAULT_MODELS: Record<Provider, string> = {
  openai: 'llama3',
  bedrock: 'cohere.command-text-v14',
};

function buildListOutput(profiles: ProfileSummary[]): string {
  if (profiles.length === 0) {
    return 'No profiles configured yet. Use `struct-extract config set` to add one.';
  }

  const nameWidth = Math.max(...profiles.map((profile) => profile.name.length)) + 2;
  const lines: string[] = [];
  lines.push('Configured profiles:');

  for (const profile of profiles) {
    const indicator = profile.isDefault ? '*' : ' ';
    const endpoint =
      profile.provider === 'bedrock' ? '(aws bedrock)' : profile.endpoint || '(endpoint not set)';
    const nameColumn = profile.name.padEnd(nameWidth, ' ');
    lines.push(
      `${indicator} ${nameColumn} ${endpoint}  provider=${profile.provider}  model=${profile.model}  updated=${profile.updatedAt}`,
    );
  }

  lines.push('');
  lines.push("'*' indicates the default profile.");
  return lines.join('\n');
}

function buildShowOutput(profile: ResolvedProfile): string {
  const lines = [`Profile '${profile.name}':`, `  provider  ${profile.provider}`];

  if (profile.provider === 'bedrock') {
    lines.push(`  region    ${profile.region ?? '(default)'}`);
  } else {
    lines.push(`  endpoint  ${profile.endpoint || '(not set)'}`);
  }

  lines.push(`  model     ${profile.model}`);
  lines.push(`  log file  ${profile.logFile ?? '(none)'}`);
  lines.push(`  api key   ${profile.apiKey ? 'stored' : 'not set'}`);
  return lines.join('\n');
}

async function handleList(
  deps: ConfigCommandDependencies,
): Promise<CommandResult> {
  const profiles = await deps.configService.listProfiles();
  return {
    exitCode: 0,
    output: { kind: 'text', text: `${buildListOutput(profiles)}\n` },
  };
}

async function handleShow(
  deps: ConfigCommandDependencies,
  argv: string[],
): Promise<CommandResult> {
  const profile = await deps.configService.getProfile(argv[1]);
  return {
    exitCode: 0,
    output: { kind: 'text', text: `${buildShowOutput(profile)}\n` },
  };
}

async function handleUse(
  deps: ConfigCommandDependencies,
  argv: string[],
): Promise<CommandResult> {
  const target = argv[1];

  if (!target) {
    throw new CliUsageError('Profile name is required for `struct-extract config use <name>`');
  }

  try {
    await deps.configService.setDefaultProfile(target);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      exitCode: 1,
      output: {
        kind: 'error',
        code: 'CONFIG_ERROR',
        message,
      },
    };
  }

  return {
    exitCode: 0,
    output: { kind: 'text', text: `Default profile set to '${target}'.\n`, scope: 'info' },
  };
}

async function handleInit(
  deps: ConfigCommandDependencies,
): Promise<CommandResult> {
  const { created, path } = await deps.configService.ensureConfigFile();
  const text = created
    ? `Config file initialized at ${path}.\n`
    : `Config file already exists at ${path}.\n`;
  return {
    exitCode: 0,
    output: { kind: 'text', text, scope: 'info' },
  };
}

interface SetOptions {
  provider?: Provider;
  endpoint?: string;
  model?: string;
  region?: string;
  apiKey?: string;
  logFile?: string;
}

function parseSetOptions(args: string[]): SetOptions {
  const options: SetOptions = {};

  for (let i = 0; i < args.length; i += 1) {
    const option = args[i];
    const value = args[i + 1];

    if (value === undefined || value.startsWith('--')) {
      throw new CliUsageError(`${option} option requires a value`);
    }
    i += 1;

    switch (option) {
      case '--provider': {
        const provider = value.toLowerCase();
        if (!isProvider(provider)) {
          throw new CliUsageError(`Unsupported provider '${value}'. Use one of: ${PROVIDERS.join(', ')}`);
        }
        options.provider = provider;
        break;
      }
      case '--endpoint':
        options.endpoint = value;
        break;
      case '--model':
        options.model = value;
        break;
      case '--region':
        options.region = value;
        break;
      case '--api-key':
        options.apiKey = value;
        break;
      case '--log-file':
        options.logFile = value;
        break;
      default:
        throw new CliUsageError(`Unknown option for config set: ${option}`);
    }
  }

  return options;
}

async function handleSet(
  deps: ConfigCommandDependencies,
  argv: string[],
): Promise<CommandResult> {
  const name = argv[1];

  if (!name || name.startsWith('--')) {
    throw new CliUsageError('Profile name is required for `struct-extract config set <name> [options]`');
  }

  const options = parseSetOptions(argv.slice(2));
  const existing = await deps.configService.getStoredProfile(name);

  const provider = options.provider ?? existing?.provider ?? 'openai';
  // Connection settings of another provider do not carry over.
  const sameProvider = existing && existing.provider === provider ? existing : undefined;

  const input: UpsertProfileInput = {
    provider,
    endpoint: options.endpoint ?? sameProvider?.endpoint ?? '',
    model: options.model ?? sameProvider?.model ?? DEFAULT_MODELS[provider],
    region: options.region ?? sameProvider?.region,
    logFile: options.logFile ?? existing?.logFile,
    vaultKeyId: existing?.vaultKeyId,
    apiKey: options.apiKey,
  };

  await deps.configService.upsertProfile(name, input);

  return {
    exitCode: 0,
    output: {
      kind: 'text',
      text: `Profile '${name}' ${existing ? 'updated' : 'created'}.\n`,
      scope: 'info',
    },
  };
}

function buildUsage(): string {
  return `struct-extract - config command

Usage:
  struct-extract config list                 # Show configured profiles
  struct-extract config show [name]          # Show one profile (default profile when omitted)
  struct-extract config use <name>           # Switch default profile
  struct-extract config set <name> [options] # Create or update a profile
  struct-extract config init                 # Create default config.json if missing

Options for set:
  --provider <${PROVIDERS.join('|')}>
  --endpoint <url>      Base URL of an OpenAI-compatible endpoint
  --model <name>
  --region <region>     AWS region for bedrock
  --api-key <key>       Stored in credentials.json beside config.json
  --log-file <path>     Append run telemetry to this file
`;
}

export function createConfigCommandDescriptor(
  deps: ConfigCommandDependencies,
): CommandDescriptor {
  return {
    name: 'config',
    summary: 'Manage connection profiles',
    usage: 'config <sub-command>',
    handler: async (context) => {
      const [subcommand] = context.argv;

      if (!subcommand || subcommand === '--help' || subcommand === '-h') {
        return {
          exitCode: 0,
          output: { kind: 'text', text: `${buildUsage()}\n`, scope: 'info' },
        };
      }

      switch (subcommand) {
        case 'list':
          return handleList(deps);
        case 'show':
          return handleShow(deps, context.argv);
        case 'use':
          return handleUse(deps, context.argv);
        case 'set':
          return handleSet(deps, context.argv);
        case 'init':
          return handleInit(deps);
        default:
          throw new CliUsageError(
            `Unknown config sub-command '${subcommand}'. Available: list, show, use, set, init`,
          );
      }
    },
  };
}
