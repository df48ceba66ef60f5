import * as path from 'path';
import { ConfigManager, type MaintenanceConfig } from '../lib/config';
import { MaintenanceError } from '../lib/errors';
import { MediaAttributesClient } from '../services/mmr/media-attributes';
import { parseArgs, type ArgSpec, type ParsedArgs } from './args';
import { logger } from './logger';

export const COMMON_FLAGS = ['--dry-run', '--verbose', '--help'];
export const COMMON_ALIASES: Record<string, string> = { '-v': '--verbose', '-h': '--help' };

export interface CommandContext {
  args: ParsedArgs;
  config: MaintenanceConfig;
  dryRun: boolean;
  verbose: boolean;
  help: boolean;
  server: string;
}

/**
 * Parse argv, load env and config, and apply `--verbose` to the logger.
 */
export async function createCommandContext(argv: string[], spec: ArgSpec): Promise<CommandContext> {
  const args = parseArgs(argv, {
    flags: [...COMMON_FLAGS, ...(spec.flags ?? [])],
    options: ['--server', ...(spec.options ?? [])],
    aliases: { ...COMMON_ALIASES, ...spec.aliases },
  });

  ConfigManager.loadEnv();
  const config = await ConfigManager.loadMaintenanceConfig();

  const verbose = args.flags.has('--verbose');
  if (verbose) {
    logger.setLevel('debug');
  }

  return {
    args,
    config,
    dryRun: args.flags.has('--dry-run'),
    verbose,
    help: args.flags.has('--help'),
    server: args.options.get('--server') ?? config.server,
  };
}

/**
 * Path from a command-line option, falling back to the configured default
 */
export function pathOption(context: CommandContext, option: string, fallback: string): string {
  const value = context.args.options.get(option);
  return value ? path.resolve(value) : fallback;
}

/**
 * Access token from the first positional argument, else MMR_ACCESS_TOKEN.
 * Dry runs send nothing, so a placeholder is enough there.
 */
export function resolveAccessToken(context: CommandContext): string {
  const token = context.args.positionals[0] ?? context.config.accessToken;
  if (token) {
    return token;
  }
  if (context.dryRun) {
    return '<token>';
  }
  throw new MaintenanceError(
    'An access token is required: pass it as the first argument or set MMR_ACCESS_TOKEN',
    'TOKEN_MISSING'
  );
}

export function createAttributesClient(context: CommandContext, accessToken: string): MediaAttributesClient {
  return new MediaAttributesClient({
    server: context.server,
    accessToken,
    forwardedHost: context.config.forwardedHost,
    timeoutMs: context.config.requestTimeoutMs,
  });
}
