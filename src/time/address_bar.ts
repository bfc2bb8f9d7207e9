import { PARAM_FROM, PARAM_TO } from '../utils/constants';
import type { RawTimeRange } from './types';

export interface AddressParams {
  from?: string | null;
  to?: string | null;
}

/**
 * Where a session reads its initial `from` / `to` and writes range changes back.
 */
export interface AddressBar {
  read(): AddressParams;
  write(range: RawTimeRange): void;
}

export function parseAddressParams(query: string): AddressParams {
  const params = new URLSearchParams(query);
  return { from: params.get(PARAM_FROM), to: params.get(PARAM_TO) };
}

/**
 * An address bar backed by a query string. Parameters other than `from` and
 * `to` are preserved.
 */
export class QueryStringAddressBar implements AddressBar {
  private params: URLSearchParams;

  constructor(query: string = '') {
    this.params = new URLSearchParams(query);
  }

  read(): AddressParams {
    return { from: this.params.get(PARAM_FROM), to: this.params.get(PARAM_TO) };
  }

  write(range: RawTimeRange): void {
    this.params.set(PARAM_FROM, range.from);
    this.params.set(PARAM_TO, range.to);
  }

  toString(): string {
    return this.params.toString();
  }
}
