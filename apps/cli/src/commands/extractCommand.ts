import {
  OUTPUT_FORMATS,
  composePrompt,
  isOutputFormat,
  type ExtractionOptions,
  type ExtractionOutcome,
  type ExtractionRequest,
  type LLMClient,
  type OutputFormat,
} from '@struct-extract/core';

import type { ResolvedInput, TextSource } from '../inputResolver.js';
import { CliUsageError } from '../errors.js';
import type { LlmClientOptions, LlmFactory } from '../llmFactory.js';
import { presentResult } from '../resultPresenter.js';
import type {
  CliCommandContext,
  CommandDescriptor,
  CommandHandler,
  CommandOutput,
  CommandResult,
} from '../types.js';
import type { ConfigService } from '../config/configService.js';
import { PROVIDERS, isProvider, type Provider, type ResolvedProfile } from '../config/types.js';

type RenderMode = 'text' | 'json';

export interface ExtractCommandOptions {
  provider?: Provider;
  baseUrl?: string;
  apiKey?: string;
  model?: string;
  region?: string;
  timeoutMs?: number;
  format: OutputFormat;
  output: RenderMode;
  prompt?: string;
  file?: string;
  help?: boolean;
  profile?: string;
}

const DEFAULT_BASE_URL = 'http://localhost:11434/v1';
const DEFAULT_OPENAI_MODEL = 'llama3';
const DEFAULT_BEDROCK_REGION = 'us-east-1';
const DEFAULT_BEDROCK_MODEL = 'cohere.command-text-v14';

/** Exit code for a completed request whose reply could not be parsed. */
export const PARSE_FAILURE_EXIT_CODE = 3;

const DEFAULTS: ExtractCommandOptions = {
  format: 'json',
  output: 'text',
};

function buildHelpMessage(): string {
  return `struct-extract - extract command

Usage:
  struct-extract [global-options] extract [options] --prompt "instructions and text"
  struct-extract [global-options] extract [options] --file ./prompt.txt
  echo "instructions and text" | struct-extract extract [options]

Options:
  --format <${OUTPUT_FORMATS.join('|')}>      Target format of the extracted data (default: ${DEFAULTS.format})
  --output <text|json>    text renders the data, json prints a result envelope (default: ${DEFAULTS.output})
  --prompt <text>         Prompt given inline
  --file <path>           Read the prompt from a file
  --profile <name>        Connection profile (default: defaultProfile in config.json)
  --provider <${PROVIDERS.join('|')}> Model backend (default: profile setting)
  --base-url <url>        Base URL of an OpenAI-compatible endpoint (default: profile or ${DEFAULT_BASE_URL})
  --api-key <key>         API key, when the endpoint needs one
  --model <name>          Model name (default: profile, ${DEFAULT_OPENAI_MODEL} or ${DEFAULT_BEDROCK_MODEL})
  --region <region>       AWS region for bedrock (default: profile or ${DEFAULT_BEDROCK_REGION})
  --timeout <ms>          Give up on the backend after this many milliseconds
  --help                  Show this help

Exit codes:
  0  data extracted
  ${PARSE_FAILURE_EXIT_CODE}  the model replied but the reply is not valid ${OUTPUT_FORMATS.map((format) => format.toUpperCase()).join('/')}`;
}

function requireValue(args: string[], index: number, option: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${option} option requires a value`);
  }
  return value;
}

function parseExtractCommandArgs(args: string[]): ExtractCommandOptions {
  const parsed: ExtractCommandOptions = {
    ...DEFAULTS,
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];

    switch (arg) {
      case '--format': {
        const format = requireValue(args, ++i, arg).toLowerCase();
        if (!isOutputFormat(format)) {
          throw new CliUsageError(`Unsupported format '${format}'. Use one of: ${OUTPUT_FORMATS.join(', ')}`);
        }
        parsed.format = format;
        break;
      }
      case '--output': {
        const mode = requireValue(args, ++i, arg).toLowerCase();
        if (mode !== 'text' && mode !== 'json') {
          throw new CliUsageError(`Unsupported output mode '${mode}'. Use text or json`);
        }
        parsed.output = mode;
        break;
      }
      case '--provider': {
        const provider = requireValue(args, ++i, arg).toLowerCase();
        if (!isProvider(provider)) {
          throw new CliUsageError(`Unsupported provider '${provider}'. Use one of: ${PROVIDERS.join(', ')}`);
        }
        parsed.provider = provider;
        break;
      }
      case '--base-url':
        parsed.baseUrl = requireValue(args, ++i, arg);
        break;
      case '--api-key':
        parsed.apiKey = requireValue(args, ++i, arg);
        break;
      case '--model':
        parsed.model = requireValue(args, ++i, arg);
        break;
      case '--region':
        parsed.region = requireValue(args, ++i, arg);
        break;
      case '--timeout': {
        const raw = requireValue(args, ++i, arg);
        const timeoutMs = Number(raw);
        if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
          throw new CliUsageError(`--timeout expects a positive number of milliseconds, got '${raw}'`);
        }
        parsed.timeoutMs = timeoutMs;
        break;
      }
      case '--prompt':
      case '--text':
        parsed.prompt = requireValue(args, ++i, arg);
        break;
      case '--file':
        parsed.file = requireValue(args, ++i, arg);
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      case '--profile':
        parsed.profile = requireValue(args, ++i, arg);
        break;
      default:
        if (arg.startsWith('--')) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        parsed.prompt = parsed.prompt ? `${parsed.prompt} ${arg}` : arg;
        break;
    }
  }

  return parsed;
}

function normalize(value?: string | null): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function inferTextSource(parsed: ExtractCommandOptions): TextSource {
  if (parsed.prompt) {
    return { kind: 'inline', value: parsed.prompt };
  }

  if (parsed.file) {
    return { kind: 'file', path: parsed.file };
  }

  return { kind: 'stdin' };
}

// Profile values only apply when the profile targets the same provider.
function resolveConnection(
  parsed: ExtractCommandOptions,
  profile: ResolvedProfile,
): LlmClientOptions {
  const provider = parsed.provider ?? profile.provider;
  const fromProfile = profile.provider === provider;

  if (provider === 'bedrock') {
    return {
      provider,
      region: normalize(parsed.region) ?? (fromProfile ? normalize(profile.region) : undefined) ?? DEFAULT_BEDROCK_REGION,
      model: normalize(parsed.model) ?? (fromProfile ? normalize(profile.model) : undefined) ?? DEFAULT_BEDROCK_MODEL,
      timeoutMs: parsed.timeoutMs,
    };
  }

  return {
    provider,
    baseUrl: normalize(parsed.baseUrl) ?? (fromProfile ? normalize(profile.endpoint) : undefined) ?? DEFAULT_BASE_URL,
    model: normalize(parsed.model) ?? (fromProfile ? normalize(profile.model) : undefined) ?? DEFAULT_OPENAI_MODEL,
    apiKey: normalize(parsed.apiKey) ?? (fromProfile ? normalize(profile.apiKey) : undefined),
    timeoutMs: parsed.timeoutMs,
  };
}

function describeConnection(connection: LlmClientOptions): Record<string, unknown> {
  return connection.provider === 'bedrock'
    ? { provider: connection.provider, model: connection.model, region: connection.region }
    : { provider: connection.provider, model: connection.model, baseUrl: connection.baseUrl };
}

async function executeExtractCommand(
  context: CliCommandContext,
  parsed: ExtractCommandOptions,
  deps: ExtractCommandDependencies,
): Promise<CommandResult> {
  if (parsed.help) {
    return {
      exitCode: 0,
      output: { kind: 'text', text: `${buildHelpMessage()}\n`, scope: 'info' },
    };
  }

  const source = inferTextSource(parsed);

  if (source.kind === 'stdin' && context.io.isStdinInteractive()) {
    throw new CliUsageError('No prompt given: pass --prompt, --file or pipe text on stdin');
  }

  const resolved = await deps.inputResolver.resolve(source);

  if (!resolved.text.trim()) {
    throw new CliUsageError('The prompt is empty');
  }

  const profile = await deps.configService.getProfile(parsed.profile);
  const connection = resolveConnection(parsed, profile);
  const request: ExtractionRequest = { rawPrompt: resolved.text, format: parsed.format };
  const composedPrompt = composePrompt(request.rawPrompt, request.format);
  const promptBytes = Buffer.byteLength(composedPrompt, 'utf-8');

  const telemetryBase = {
    profile: profile.name,
    provider: connection.provider,
    format: request.format,
    promptBytes,
  };

  if (context.globals.dryRun) {
    return {
      exitCode: 0,
      output: {
        kind: 'dry-run',
        summary: 'Composed the extraction prompt without calling the model backend',
        details: {
          profile: profile.name,
          ...describeConnection(connection),
          format: request.format,
          inputBytes: resolved.metadata.bytes,
          promptBytes,
          prompt: composedPrompt,
        },
      },
      telemetry: telemetryBase,
    };
  }

  const client = deps.llmFactory(connection);
  const startedAt = Date.now();

  const outcome = await deps.extractionExecutor(client, request, { model: connection.model });

  const durationMs = Date.now() - startedAt;
  const completionBytes = Buffer.byteLength(outcome.rawCompletion, 'utf-8');
  const { result } = outcome;

  const output: CommandOutput =
    parsed.output === 'json'
      ? {
          kind: 'json',
          data: {
            result,
            profile: profile.name,
            provider: connection.provider,
            model: connection.model,
            metrics: {
              durationMs,
              promptBytes,
              completionBytes,
            },
          },
        }
      : presentResult(result);

  return {
    exitCode: result.kind === 'parse-failure' ? PARSE_FAILURE_EXIT_CODE : 0,
    output,
    logFile: profile.logFile,
    telemetry: {
      ...telemetryBase,
      outcome: result.kind,
      completionBytes,
      errorCode: result.kind === 'parse-failure' ? 'E_PARSE_FAILED' : undefined,
    },
  };
}

export interface TextInputResolver {
  resolve(source: TextSource): Promise<ResolvedInput>;
}

export type ExtractionExecutor = (
  client: LLMClient,
  request: ExtractionRequest,
  options: ExtractionOptions,
) => Promise<ExtractionOutcome>;

export interface ExtractCommandDependencies {
  inputResolver: TextInputResolver;
  configService: Pick<ConfigService, 'getProfile'>;
  llmFactory: LlmFactory;
  extractionExecutor: ExtractionExecutor;
}

export function createExtractCommandHandler(deps: ExtractCommandDependencies): CommandHandler {
  return async (context) => {
    const parsed = parseExtractCommandArgs(context.argv);
    return executeExtractCommand(context, parsed, deps);
  };
}

export function createExtractCommandDescriptor(
  deps: ExtractCommandDependencies,
): CommandDescriptor {
  return {
    name: 'extract',
    summary: 'Ask the model for data and parse the reply as JSON or CSV',
    usage: 'extract [options]',
    handler: createExtractCommandHandler(deps),
  };
}
