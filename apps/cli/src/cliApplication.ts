import type {
  CliApplication,
  CliApplicationConfig,
  CliCommandContext,
  CliGlobals,
  CommandDescriptor,
  CommandResult,
  ExecutionTelemetry,
  ProcessIO,
} from './types.js';

import { AuditLogger } from './auditLogger.js';
import { ErrorDomainMapper } from './errorDomainMapper.js';
import { OutputFormatter } from './outputFormatter.js';

interface ParsedArguments {
  command?: string;
  argv: string[];
  globals: CliGlobals;
  helpRequested: boolean;
  error?: string;
}

type GlobalFlag = 'help' | 'quiet' | 'dryRun' | 'logFile';

interface GlobalOption {
  flag: GlobalFlag;
  names: string[];
  valueName?: string;
  description: string;
}

const GLOBAL_OPTIONS: GlobalOption[] = [
  { flag: 'help', names: ['--help', '-h'], description: 'Show help for the CLI or, before a command, for that command' },
  { flag: 'quiet', names: ['--quiet'], description: 'Suppress informational output' },
  { flag: 'dryRun', names: ['--dry-run'], description: 'Compose the prompt without calling the model backend' },
  {
    flag: 'logFile',
    names: ['--log-file'],
    valueName: '<path>',
    description: 'Write a JSON line per run to this file (overrides the profile setting)',
  },
];

function findGlobalOption(token: string): GlobalOption | undefined {
  return GLOBAL_OPTIONS.find((option) => option.names.includes(token));
}

// Global options only appear before the command name; everything after it
// belongs to the command. `--help <command>` becomes `<command> --help`.
function parseArguments(rawArgs: string[]): ParsedArguments {
  const parsed: ParsedArguments = {
    argv: [],
    globals: { quiet: false, dryRun: false, logFile: undefined },
    helpRequested: false,
  };

  let index = 0;

  for (; index < rawArgs.length; index += 1) {
    const token = rawArgs[index];

    if (!token.startsWith('-')) {
      break;
    }

    const option = findGlobalOption(token);

    if (!option) {
      return { ...parsed, error: `Unknown option: ${token}` };
    }

    switch (option.flag) {
      case 'help':
        parsed.helpRequested = true;
        break;
      case 'quiet':
        parsed.globals.quiet = true;
        break;
      case 'dryRun':
        parsed.globals.dryRun = true;
        break;
      case 'logFile': {
        const value = rawArgs[index + 1];
        if (!value || value.startsWith('-')) {
          return { ...parsed, error: `${token} option requires a file path` };
        }
        parsed.globals.logFile = value;
        index += 1;
        break;
      }
      default: {
        const unsupported: never = option.flag;
        return { ...parsed, error: `Unsupported option: ${String(unsupported)}` };
      }
    }
  }

  parsed.command = rawArgs[index];
  parsed.argv = rawArgs.slice(index + 1);

  if (parsed.command && parsed.helpRequested && !parsed.argv.includes('--help')) {
    parsed.argv = ['--help', ...parsed.argv];
  }

  return parsed;
}

function formatUsage(
  config: CliApplicationConfig,
  commands: CommandDescriptor[],
): string {
  const lines = [config.description, '', `Usage: ${config.name} [global-options] <command> [options]`, ''];

  if (commands.length === 0) {
    lines.push('No commands have been registered yet.');
    return lines.join('\n');
  }

  const usageWidth = Math.max(...commands.map((command) => command.usage.length));

  lines.push('Commands:');
  for (const command of commands) {
    lines.push(`  ${command.usage.padEnd(usageWidth)}  ${command.summary}`);
  }

  const labels = GLOBAL_OPTIONS.map((option) =>
    [option.names.join(', '), option.valueName].filter(Boolean).join(' '),
  );
  const labelWidth = Math.max(...labels.map((label) => label.length));

  lines.push('', 'Global options:');
  GLOBAL_OPTIONS.forEach((option, position) => {
    lines.push(`  ${labels[position].padEnd(labelWidth)}  ${option.description}`);
  });

  lines.push('', `Run '${config.name} <command> --help' for the options of a command.`);

  return lines.join('\n');
}

export function createCliApplication(config: CliApplicationConfig): CliApplication {
  const { router } = config;
  const auditLogger = config.auditLogger ?? new AuditLogger();
  const errorMapper = new ErrorDomainMapper();

  return {
    async run(argv, io) {
      const [, , ...rawArgs] = argv;
      const parsed = parseArguments(rawArgs);
      const formatter = new OutputFormatter(io, parsed.globals);

      if (parsed.error) {
        const message = `Error: ${parsed.error}`;
        io.writeStderr(`${message}\n`);
        io.writeStderr('Use --help to list available commands.\n');
        io.setExitCode(1);
        return 1;
      }

      if (!parsed.command) {
        if (parsed.helpRequested) {
          const usage = formatUsage(config, router.list());
          io.writeStdout(`${usage}\n`);
          io.setExitCode(0);
          return 0;
        }

        io.writeStderr("No command provided. Use '--help' to list available commands.\n");
        io.setExitCode(1);
        return 1;
      }

      const descriptor = router.find(parsed.command);

      if (!descriptor) {
        io.writeStderr(`Unknown command '${parsed.command}'.\n`);
        io.writeStderr('Use --help to list available commands.\n');
        io.setExitCode(1);
        return 1;
      }

      const context: CliCommandContext = {
        globals: parsed.globals,
        argv: parsed.argv,
        io,
      };

      const startedAt = new Date();
      let result: CommandResult;

      try {
        result = await descriptor.handler(context);
      } catch (error) {
        const mapped = errorMapper.map(error);
        result = {
          exitCode: mapped.exitCode,
          output: mapped.output,
          telemetry: { errorCode: mapped.errorCode },
        };
      }

      formatter.emit(result.output);

      const finishedAt = new Date();
      const telemetry = buildTelemetry(
        descriptor.name,
        startedAt,
        finishedAt,
        result.exitCode,
        result.telemetry,
      );
      const logFilePath = parsed.globals.logFile ?? result.logFile;
      try {
        await auditLogger.record(telemetry, logFilePath);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        io.writeStderr(`Warning: could not write audit log to ${logFilePath}: ${message}\n`);
      }

      io.setExitCode(result.exitCode);
      return result.exitCode;
    },
  };
}

function buildTelemetry(
  commandName: string,
  startedAt: Date,
  finishedAt: Date,
  exitCode: number,
  partial?: Partial<ExecutionTelemetry>,
): ExecutionTelemetry {
  return {
    command: commandName,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    status: exitCode === 0 ? 'success' : 'failure',
    profile: partial?.profile,
    provider: partial?.provider,
    format: partial?.format,
    outcome: partial?.outcome,
    promptBytes: partial?.promptBytes,
    completionBytes: partial?.completionBytes,
    errorCode: partial?.errorCode,
  };
}
