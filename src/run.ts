import type { IConfigComponent, ILoggerComponent } from '@well-known-components/interfaces';
import { formatReport, runDemo } from './demo.js';
import { helpText, parseDemoCommand } from './settings.js';

/**
 * Runs the demo for command-line `args`, writing output through `write`.
 * Failures are logged rather than thrown.
 * @returns Process exit code
 */
export async function runCli(
  program: string,
  args: readonly string[],
  components: { config: IConfigComponent; logger: ILoggerComponent.ILogger },
  write: (text: string) => void
): Promise<number> {
  const { config, logger } = components;
  try {
    const command = await parseDemoCommand(config, args);
    if (command.kind === 'help') {
      write(helpText(program).join('\n') + '\n');
      return 0;
    }

    const report = runDemo(command.settings, logger);
    write(formatReport(report).join('\n') + '\n');
    return 0;
  } catch (error) {
    logger.error(error instanceof Error ? error : String(error));
    return 1;
  }
}
