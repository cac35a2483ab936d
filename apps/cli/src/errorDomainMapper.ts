import { isBackendError, type BackendErrorKind } from '@struct-extract/core';

import { InputResolveError } from './inputResolver.js';
import { CliUsageError } from './errors.js';
import type { CommandOutput } from './types.js';

interface MappedError {
  exitCode: number;
  output: CommandOutput;
  errorCode: string;
}

const BACKEND_CODES: Record<BackendErrorKind, { code: string; suggestions: string[] }> = {
  auth: {
    code: 'E_AUTH',
    suggestions: ['Check the API key or AWS credentials of the selected profile'],
  },
  quota: {
    code: 'E_QUOTA',
    suggestions: ['The backend is rate limiting requests; try again later'],
  },
  network: {
    code: 'E_NETWORK',
    suggestions: ['Check the network connection and the endpoint URL'],
  },
  timeout: {
    code: 'E_TIMEOUT',
    suggestions: ['Try again later or raise --timeout'],
  },
  configuration: {
    code: 'CONFIG_ERROR',
    suggestions: ["Run 'struct-extract config show' to inspect the profile"],
  },
  response: { code: 'E_BACKEND', suggestions: [] },
  unknown: { code: 'E_BACKEND', suggestions: [] },
};

export class ErrorDomainMapper {
  map(error: unknown): MappedError {
    if (error instanceof CliUsageError || error instanceof InputResolveError) {
      return this.build('E_USAGE', error.message, 2, [
        "Run 'struct-extract extract --help' to see the available options",
      ]);
    }

    if (isConfigError(error)) {
      return this.build('CONFIG_ERROR', error.message, 1, [
        "Run 'struct-extract config list' to check the configured profiles",
      ]);
    }

    if (isBackendError(error)) {
      const { code, suggestions } = BACKEND_CODES[error.kind];
      return this.build(code, error.message, 1, suggestions);
    }

    if (error instanceof Error) {
      return this.build('E_UNEXPECTED', error.message, 1);
    }

    return this.build('E_UNEXPECTED', String(error), 1);
  }

  private build(
    code: string,
    message: string,
    exitCode: number,
    suggestions: string[] = [],
  ): MappedError {
    return {
      exitCode,
      errorCode: code,
      output: {
        kind: 'error',
        code,
        message,
        suggestions,
      },
    };
  }
}

function isConfigError(error: unknown): error is Error {
  return error instanceof Error && error.name === 'ConfigError';
}
