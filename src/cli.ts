#!/usr/bin/env node
import { createDotEnvConfigComponent } from '@well-known-components/env-config-provider';
import { createLogComponent } from '@well-known-components/logger';
import { runCli } from './run.js';

const PROGRAM = 'bloom-probe-demo';

async function main(): Promise<void> {
  const config = await createDotEnvConfigComponent(
    { path: ['.env.default', '.env'] },
    {
      LOG_LEVEL: 'INFO',
    }
  );
  const logs = await createLogComponent({ config });
  const logger = logs.getLogger(PROGRAM);

  process.exitCode = await runCli(PROGRAM, process.argv.slice(2), { config, logger }, (text) => {
    process.stdout.write(text);
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
