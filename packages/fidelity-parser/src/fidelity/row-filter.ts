import type { RawRow, RewindableTextStream } from '@tradeledger/types';
import { tryParseDate } from '../normalizers/index.js';
import { DATE_FIELD } from './schema.js';
import { readRawRows } from './schema-reader.js';

const RUN_DATE_PATTERN = /^[0-9]{1,2}\/[0-9]{1,2}\/[0-9]{4}$/;

export interface AcceptedRow {
  row: RawRow;
  /** Run date as YYYY-MM-DD. */
  runDate: string;
}

export type RowOutcome =
  | ({ accepted: true } & AcceptedRow)
  | { accepted: false; reason: 'date-format' | 'date-range' };

/**
 * Decide whether a raw row is a transaction line. Disclaimer and footer text
 * in the export fails the run-date check and is rejected.
 */
export function classifyRow(row: RawRow): RowOutcome {
  const dateStr = row[DATE_FIELD] ?? '';
  if (!RUN_DATE_PATTERN.test(dateStr)) {
    return { accepted: false, reason: 'date-format' };
  }
  const parsed = tryParseDate(dateStr);
  if (!parsed.ok) {
    return { accepted: false, reason: 'date-range' };
  }
  return { accepted: true, row, runDate: parsed.date };
}

export function* acceptedRows(stream: RewindableTextStream): Generator<AcceptedRow, void, undefined> {
  for (const row of readRawRows(stream)) {
    const outcome = classifyRow(row);
    if (outcome.accepted) {
      yield { row: outcome.row, runDate: outcome.runDate };
    }
  }
}

export function countAcceptedRows(stream: RewindableTextStream): number {
  let count = 0;
  for (const _row of acceptedRows(stream)) {
    count++;
  }
  return count;
}
