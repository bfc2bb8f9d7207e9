import { InvalidExpressionError } from '../time/errors';
import { decodeStoredBoundary } from '../time/range_codec';

/**
 * Parses a `--now` style option: an ISO-8601 timestamp or any absolute
 * address-bar encoding. Relative expressions are rejected; an anchor cannot
 * depend on itself.
 */
export function parseInstantOption(raw: string): number {
  const boundary = decodeStoredBoundary(raw);
  if (boundary.kind !== 'absolute') {
    throw new InvalidExpressionError(raw, 'an anchor instant must be absolute');
  }
  return boundary.at.valueOf();
}
