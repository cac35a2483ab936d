import process from 'node:process';

import { extractStructuredData } from '@struct-extract/core';

import { AuditLogger } from './auditLogger.js';
import { createCliApplication } from './cliApplication.js';
import { CommandRouter } from './commandRouter.js';
import { createConfigCommandDescriptor } from './commands/configCommand.js';
import { createExtractCommandDescriptor } from './commands/extractCommand.js';
import { createCredentialVault } from './config/credentialVault.js';
import { ConfigService } from './config/configService.js';
import { resolveConfigFilePath, resolveCredentialsFilePath } from './config/configPaths.js';
import { ConfigStore } from './config/configStore.js';
import { InputResolver } from './inputResolver.js';
import { createLlmClient } from './llmFactory.js';
import { createNodeProcessIO } from './processIo.js';

async function main(): Promise<void> {
  const configFilePath = resolveConfigFilePath();
  const configStore = new ConfigStore(configFilePath);
  const credentialVault = createCredentialVault(resolveCredentialsFilePath(configFilePath));
  const configService = new ConfigService(configStore, credentialVault);
  await configService.initialize();
  const logSettings = await configService.getLogSettings();

  const router = new CommandRouter();
  router.register(
    createExtractCommandDescriptor({
      inputResolver: new InputResolver(),
      configService,
      llmFactory: createLlmClient,
      extractionExecutor: extractStructuredData,
    }),
  );
  router.register(
    createConfigCommandDescriptor({
      configService,
    }),
  );

  const app = createCliApplication({
    name: 'struct-extract',
    description: 'Turn model output into JSON or CSV data',
    router,
    auditLogger: new AuditLogger({ append: logSettings.append }),
  });

  const io = createNodeProcessIO(process);
  const exitCode = await app.run(process.argv, io);

  if (typeof process.exitCode !== 'number') {
    process.exitCode = exitCode;
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = 1;
});
