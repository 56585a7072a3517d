import { parse } from 'csv-parse/sync';
import type { Options } from 'csv-parse/sync';
import type { RawRow, RewindableTextStream } from '@tradeledger/types';
import { FIDELITY_FIELDS } from './schema.js';

// Excel dialect: comma separated, double-quote quoting with "" as escape.
// A record that still fails to parse (an unclosed quote in a footer line) is
// dropped like any other non-transaction row.
const CSV_OPTIONS: Options = {
  bom: true,
  delimiter: ',',
  quote: '"',
  escape: '"',
  relax_column_count: true,
  relax_quotes: true,
  skip_empty_lines: true,
  skip_records_with_error: true,
};

function readRecords(stream: RewindableTextStream, options: Options = CSV_OPTIONS): string[][] {
  stream.rewind();
  return parse(stream.read(), options);
}

/**
 * Map CSV cells onto the fixed column schema. Cells past the last column are
 * dropped; missing trailing cells become null.
 */
export function toRawRow(cells: readonly string[]): RawRow {
  return Object.fromEntries(FIDELITY_FIELDS.map((field, i) => [field, cells[i] ?? null]));
}

/**
 * Yield one raw row per CSV record, starting from the beginning of the stream.
 * The header line, if present, comes through as an ordinary row.
 */
export function* readRawRows(stream: RewindableTextStream): Generator<RawRow, void, undefined> {
  for (const cells of readRecords(stream)) {
    yield toRawRow(cells);
  }
}

/** The file's first record, or null when the file has none. */
export function readHeader(stream: RewindableTextStream): string[] | null {
  const [first] = readRecords(stream, { ...CSV_OPTIONS, to: 1 });
  return first ?? null;
}
