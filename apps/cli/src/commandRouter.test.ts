import assert from 'node:assert/strict';
import test from 'node:test';

import { CommandRouter } from './commandRouter.js';
import type { CommandDescriptor } from './types.js';

function descriptor(name: string): CommandDescriptor {
  return {
    name,
    summary: `${name} summary`,
    usage: name,
    handler: async () => ({ exitCode: 0 }),
  };
}

test('finds registered commands and lists them by name', () => {
  const router = new CommandRouter();
  router.register(descriptor('extract'));
  router.register(descriptor('config'));

  assert.equal(router.find('extract')?.summary, 'extract summary');
  assert.equal(router.find('missing'), undefined);
  assert.deepEqual(
    router.list().map((item) => item.name),
    ['config', 'extract'],
  );
});

test('rejects a second command with the same name', () => {
  const router = new CommandRouter();
  router.register(descriptor('extract'));

  assert.throws(() => router.register(descriptor('extract')), /Command 'extract' is already registered/);
});
