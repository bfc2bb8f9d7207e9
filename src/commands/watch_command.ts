import { Command, Option } from 'commander';
import fs from 'fs';
import { createLogger, Logger } from '../utils/logger';
import { QueryStringAddressBar } from '../time/address_bar';
import { intervalToMs } from '../time/interval';
import { SessionCoordinator } from '../time/session_coordinator';
import { setLongTimeout } from '../utils/timers';

export interface WatchOptions {
  query?: string;
  duration?: string;
}

export interface WatchSummary {
  refreshes: number;
  /** The address-bar query string when the session ended. */
  query: string;
}

/**
 * Runs a dashboard session for `duration`, logging the resolved range on every
 * refresh request. Resolves early if `signal` aborts.
 */
export async function watchSession(
  dashboardSettings: unknown,
  options: WatchOptions = {},
  logger: Logger = createLogger(),
  signal?: AbortSignal
): Promise<WatchSummary> {
  const durationMs = intervalToMs(options.duration ?? '1m');
  const addressBar = new QueryStringAddressBar(options.query ?? '');
  const coordinator = new SessionCoordinator({ addressBar, logger });
  let refreshes = 0;

  const unsubscribe = coordinator.subscribe({
    onRefreshRequested: (event) => {
      refreshes++;
      const range = coordinator.getResolvedRange();
      logger.info(`Refresh #${refreshes} (${event.reason}): ${range.from.toISOString()} to ${range.to.toISOString()}`);
    },
  });

  try {
    coordinator.init(dashboardSettings);
    await new Promise<void>((resolve) => {
      const timer = setLongTimeout(finish, durationMs);
      function finish() {
        timer.cancel();
        signal?.removeEventListener('abort', finish);
        resolve();
      }
      if (signal?.aborted) {
        finish();
      } else {
        signal?.addEventListener('abort', finish);
      }
    });
  } finally {
    coordinator.dispose();
    unsubscribe();
  }

  return { refreshes, query: addressBar.toString() };
}

async function watch(dashboardPath: string, options: WatchOptions) {
  const logger = createLogger();
  try {
    const settings: unknown = JSON.parse(fs.readFileSync(dashboardPath, 'utf-8'));
    const summary = await watchSession(settings, options, logger);
    logger.info(`Session ended after ${summary.refreshes} refreshes`, { query: summary.query });
  } catch (error) {
    if (error instanceof Error) {
      logger.error(`Failed to watch dashboard ${dashboardPath}`, { error: error.message });
    } else {
      logger.error('An unknown error occurred while watching the dashboard.', { error });
    }
    process.exitCode = 1;
  }
}

export const watchCommand = new Command('session:watch')
  .description('Run a dashboard session and log every refresh until the duration elapses')
  .argument('<dashboard>', 'Path to a dashboard JSON file')
  .option('--query <query>', 'Address-bar query string, e.g. "from=now-1h&to=now"')
  .addOption(new Option('--duration <interval>', 'How long to keep the session open').default('1m'))
  .action(watch);
