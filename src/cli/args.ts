/**
 * Command-line parsing for the auditor.
 *
 * Usage: disk-overage-notifier [--limit <TiB>] [--group <name>] [--write]
 *                              [--verbose] [--debug] [--config <path>]
 *
 * Without --verbose or --debug the log level comes from LOG_LEVEL, else warn.
 */
import { ALLOWED_GROUPS, DEFAULT_GROUP, DEFAULT_LIMIT_TIB } from '@/config/schema.js';
import type { AllowedGroup } from '@/config/schema.js';
import { ConfigError } from '@/config/loader.js';
import type { RunOptions } from '@/config/types.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { LogLevel } from '@/observability/types.js';

export const DEFAULT_CONFIG_PATH = 'config/audit.json';

export interface CliOptions extends RunOptions {
  configPath: string;
  logLevel: LogLevel;
  /** Debug mode also checks how long the usage API token stays valid. */
  debug: boolean;
  help: boolean;
}

export const USAGE = `Warn users if they're using too much disk space

Options:
  --limit <TiB>     Threshold in TiB (default ${String(DEFAULT_LIMIT_TIB)})
  --group <name>    Group to check: ${ALLOWED_GROUPS.join(', ')} (default ${DEFAULT_GROUP})
  --write           Send email and record notifications (default: dry run)
  --verbose         Chatty
  --debug           Very chatty
  --config <path>   Configuration file (default $DISK_AUDIT_CONFIG or ${DEFAULT_CONFIG_PATH})
  --help            Show this message`;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isAllowedGroup(value: string): value is AllowedGroup {
  return ALLOWED_GROUPS.some((group) => group === value);
}

export function parseCliArgs(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Result<CliOptions, ConfigError> {
  let limitTib = DEFAULT_LIMIT_TIB;
  let group: AllowedGroup = DEFAULT_GROUP;
  let write = false;
  let verbose = false;
  let debug = false;
  let help = false;
  let configPath = env['DISK_AUDIT_CONFIG'] ?? DEFAULT_CONFIG_PATH;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case '--limit': {
        const value = next === undefined ? Number.NaN : Number(next);
        if (!Number.isFinite(value) || value <= 0) {
          return err(new ConfigError(`--limit expects a positive number, got "${next ?? ''}"`));
        }
        limitTib = value;
        i++;
        break;
      }
      case '--group':
        if (next === undefined || !isAllowedGroup(next)) {
          return err(
            new ConfigError(`--group must be one of: ${ALLOWED_GROUPS.join(', ')}`, { group: next }),
          );
        }
        group = next;
        i++;
        break;
      case '--config':
        if (next === undefined || next === '') {
          return err(new ConfigError('--config expects a file path'));
        }
        configPath = next;
        i++;
        break;
      case '--write':
        write = true;
        break;
      case '--verbose':
        verbose = true;
        break;
      case '--debug':
        debug = true;
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        return err(new ConfigError(`Unknown argument: ${String(arg)}`));
    }
  }

  const fromEnv = env['LOG_LEVEL'];
  let logLevel: LogLevel = 'warn';
  if (debug) {
    logLevel = 'debug';
  } else if (verbose) {
    logLevel = 'info';
  } else if (fromEnv) {
    if (!isLogLevel(fromEnv)) {
      return err(
        new ConfigError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`, { logLevel: fromEnv }),
      );
    }
    logLevel = fromEnv;
  }

  return ok({ limitTib, group, write, configPath, logLevel, debug, help });
}
