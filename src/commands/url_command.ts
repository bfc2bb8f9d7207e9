import { Command } from 'commander';
import { timeConfig } from '../config';
import { logger } from '../utils/logger';
import { QueryStringAddressBar } from '../time/address_bar';
import { decodeBoundary, encodeForAddress } from '../time/range_codec';
import { parseInstantOption } from './cli_options';

export interface UrlOptions {
  from?: string;
  to?: string;
  absolute?: boolean;
  now?: string;
}

/**
 * Builds the `from` / `to` query string for a range. Relative boundaries are
 * kept as written unless `absolute` pins them to `now`.
 */
export function buildAddressQuery(options: UrlOptions = {}): string {
  const range = {
    from: decodeBoundary(options.from ?? timeConfig.defaultFrom),
    to: decodeBoundary(options.to ?? timeConfig.defaultTo),
  };
  const now = options.now ? parseInstantOption(options.now) : Date.now();

  const addressBar = new QueryStringAddressBar();
  addressBar.write(encodeForAddress(range, options.absolute ?? false, now));
  return addressBar.toString();
}

async function url(options: UrlOptions) {
  try {
    logger.info(buildAddressQuery(options));
  } catch (error) {
    if (error instanceof Error) {
      logger.error('Failed to encode the time range', { error: error.message });
    } else {
      logger.error('An unknown error occurred while encoding the time range.', { error });
    }
    process.exitCode = 1;
  }
}

export const urlCommand = new Command('time:url')
  .description('Print the address-bar parameters for a time range')
  .option('--from <boundary>', 'Range start; defaults to DEFAULT_TIME_FROM')
  .option('--to <boundary>', 'Range end; defaults to DEFAULT_TIME_TO')
  .option('--absolute', 'Resolve both boundaries to epoch milliseconds for a shareable link')
  .option('--now <instant>', 'Anchor instant for --absolute (ISO-8601 or epoch ms)')
  .action(url);
