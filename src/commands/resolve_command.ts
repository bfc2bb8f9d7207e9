import { Command, Option } from 'commander';
import { parseTimezone, parseWeekStart } from '../config';
import { logger } from '../utils/logger';
import { decodeBoundary } from '../time/range_codec';
import { resolveBoundary } from '../time/date_math';
import { parseInstantOption } from './cli_options';

export interface ResolveOptions {
  now?: string;
  roundUp?: boolean;
  weekStart?: string;
  timezone?: string;
}

/**
 * Resolves one boundary as the dashboard would and returns it as an ISO-8601 string.
 */
export function resolveExpression(expression: string, options: ResolveOptions = {}): string {
  const boundary = decodeBoundary(expression);
  const now = options.now ? parseInstantOption(options.now) : Date.now();
  const resolved = resolveBoundary(boundary, now, options.roundUp ?? false, {
    weekStart: options.weekStart ? parseWeekStart(options.weekStart) : undefined,
    timezone: options.timezone ? parseTimezone(options.timezone) : undefined,
  });
  return resolved.toISOString();
}

async function resolve(expression: string, options: ResolveOptions) {
  try {
    logger.info(`${expression} -> ${resolveExpression(expression, options)}`);
  } catch (error) {
    if (error instanceof Error) {
      logger.error(`Failed to resolve "${expression}"`, { error: error.message });
    } else {
      logger.error('An unknown error occurred while resolving the expression.', { error });
    }
    process.exitCode = 1;
  }
}

export const resolveCommand = new Command('time:resolve')
  .description('Resolve a time boundary (now-6h, now/d, 20230101, epoch ms) to an instant')
  .argument('<expression>', 'The boundary to resolve')
  .option('--now <instant>', 'Anchor instant (ISO-8601 or epoch ms); defaults to the current time')
  .option('--round-up', 'Round to the end of the unit instead of the start (as for a "to" boundary)')
  .addOption(new Option('--week-start <day>', 'First day of the week for /w rounding').choices(['sunday', 'monday']))
  .addOption(new Option('--timezone <timezone>', 'Timezone for calendar arithmetic').choices(['utc', 'local']))
  .action(resolve);
