import { parseSlashDate, tryParseSlashDate, parseToDecimal } from '@tradeledger/types';
import type { DateParseResult } from '@tradeledger/types';

/**
 * Turn a free-text account name into a token safe for ledger account names.
 *
 * Everything other than [A-Za-z0-9-_:] and whitespace is stripped first, so
 * "Acct\t#1" loses the "#" before the tab becomes a space. Runs of spaces
 * then collapse and the remaining spaces become hyphens.
 */
export function beanifyAccount(name: string): string {
  let result = name.replace(/[^a-zA-Z0-9\-_: \t\n\r\v\f]/g, '');
  result = result.replace(/[ \t\n\r\v\f]/g, ' ');
  result = result.replace(/ {2,}/g, ' ');
  return result.replace(/ /g, '-');
}

/** Parse a Fidelity run date (M/D/YYYY) into YYYY-MM-DD. */
export function parseDate(dateStr: string): string {
  return parseSlashDate(dateStr);
}

export function tryParseDate(dateStr: string): DateParseResult {
  return tryParseSlashDate(dateStr);
}

export { parseToDecimal };
