/**
 * CLI flow: parse arguments, load configuration, build the application
 * context, run one audit, and translate fatal errors into an exit code.
 */
import { loadAuditConfig } from '@/config/index.js';
import { createAppContext } from '@/infrastructure/index.js';
import type { AppContext, AppContextOverrides } from '@/infrastructure/index.js';
import { createLogger } from '@/observability/index.js';
import type { LogLevel, Logger } from '@/observability/index.js';

import { USAGE, parseCliArgs } from './args.js';

export interface RunCliOptions {
  env?: NodeJS.ProcessEnv;
  /** Where usage text and the summary line go. Defaults to stdout. */
  print?: (line: string) => void;
  createLogger?: (level: LogLevel) => Logger;
  overrides?: AppContextOverrides;
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const context = 'context' in error && typeof error.context === 'object' ? error.context : undefined;
    return { error: error.message, errorName: error.name, ...(context ?? {}) };
  }
  return { error: String(error) };
}

/** Run the auditor once. Resolves to the process exit code. */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const print = options.print ?? ((line: string): void => console.log(line));
  const makeLogger = options.createLogger ?? ((level: LogLevel): Logger => createLogger({ level }));

  const parsed = parseCliArgs(argv, options.env);
  if (!parsed.ok) {
    print(parsed.error.message);
    print(USAGE);
    return 1;
  }
  const cli = parsed.value;
  if (cli.help) {
    print(USAGE);
    return 0;
  }

  const logger = makeLogger(cli.logLevel);

  const loaded = await loadAuditConfig(cli.configPath);
  if (!loaded.ok) {
    logger.fatal(loaded.error.message, { component: 'cli', ...loaded.error.context });
    return 1;
  }

  let context: AppContext;
  try {
    context = createAppContext(loaded.value, logger, options.overrides);
  } catch (error) {
    logger.fatal('Failed to initialize', { component: 'cli', ...describeError(error) });
    return 1;
  }

  try {
    if (cli.debug) {
      const token = await context.usageSource.describeToken();
      if (!token.ok) {
        throw token.error;
      }
      logger.warn(`Token is valid until ${token.value.validUntil}`, { component: 'cli' });
    }

    const summary = await context.auditor.run({
      group: cli.group,
      limitTib: cli.limitTib,
      write: cli.write,
    });
    context.reporter.summary(summary);
    return 0;
  } catch (error) {
    logger.fatal(error instanceof Error ? error.message : String(error), {
      component: 'cli',
      ...describeError(error),
    });
    return 1;
  } finally {
    context.close();
  }
}
