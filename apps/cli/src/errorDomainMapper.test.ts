import assert from 'node:assert/strict';
import test from 'node:test';

import { BackendError } from '@struct-extract/core';

import { ConfigError } from './config/configError.js';
import { ErrorDomainMapper } from './errorDomainMapper.js';
import { CliUsageError } from './errors.js';
import { InputResolveError } from './inputResolver.js';

const mapper = new ErrorDomainMapper();

test('usage and input errors exit with code 2', () => {
  for (const error of [new CliUsageError('bad flag'), new InputResolveError('stdin provided no data')]) {
    const mapped = mapper.map(error);
    assert.equal(mapped.exitCode, 2);
    assert.equal(mapped.errorCode, 'E_USAGE');
  }
});

test('config errors map to CONFIG_ERROR', () => {
  const mapped = mapper.map(new ConfigError("profile 'prod' does not exist"));
  assert.equal(mapped.exitCode, 1);
  assert.deepEqual(mapped.output, {
    kind: 'error',
    code: 'CONFIG_ERROR',
    message: "profile 'prod' does not exist",
    suggestions: ["Run 'struct-extract config list' to check the configured profiles"],
  });
});

test('backend error kinds pick their own codes', () => {
  const cases = [
    ['auth', 'E_AUTH'],
    ['quota', 'E_QUOTA'],
    ['network', 'E_NETWORK'],
    ['timeout', 'E_TIMEOUT'],
    ['configuration', 'CONFIG_ERROR'],
    ['response', 'E_BACKEND'],
    ['unknown', 'E_BACKEND'],
  ] as const;

  for (const [kind, code] of cases) {
    const mapped = mapper.map(new BackendError('failed', { kind }));
    assert.equal(mapped.errorCode, code, kind);
    assert.equal(mapped.exitCode, 1);
  }
});

test('anything else is unexpected', () => {
  assert.equal(mapper.map(new Error('boom')).errorCode, 'E_UNEXPECTED');

  const mapped = mapper.map('plain string');
  assert.equal(mapped.errorCode, 'E_UNEXPECTED');
  assert.equal(mapped.output.kind === 'error' ? mapped.output.message : undefined, 'plain string');
});
