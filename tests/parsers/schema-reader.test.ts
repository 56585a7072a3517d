import { describe, it, expect } from 'vitest';
import {
  FIDELITY_FIELDS,
  StringTextStream,
  readHeader,
  readRawRows,
  toRawRow,
} from '@tradeledger/fidelity-parser';
import { BUY_ROW, HEADER, csvFile, csvLine } from '../helpers/fidelity-csv.js';

describe('readRawRows', () => {
  it('should yield the header line as an ordinary row', () => {
    const stream = new StringTextStream(csvFile([HEADER, csvLine(BUY_ROW)]));
    const rows = Array.from(readRawRows(stream));

    expect(rows).toHaveLength(2);
    expect(rows[0]?.['Run Date']).toBe('Run Date');
    expect(rows[1]?.['Account']).toBe('Roth IRA  ****1234');
    expect(rows[1]?.['Amount']).toBe('-490.20');
  });

  it('should drop cells past the last schema column', () => {
    const stream = new StringTextStream(csvFile([csvLine(BUY_ROW), `${csvLine(BUY_ROW)},extra1,extra2`]));
    const rows = Array.from(readRawRows(stream));

    expect(Object.keys(rows[1] ?? {})).toEqual([...FIDELITY_FIELDS]);
    expect(rows[1]?.['Settlement Date']).toBe('1/8/2024');
  });

  it('should fill missing trailing cells with null', () => {
    const stream = new StringTextStream(csvFile([HEADER, 'Date downloaded 01/15/2024 4:00 PM ET']));
    const [, footer] = Array.from(readRawRows(stream));

    expect(footer?.['Run Date']).toBe('Date downloaded 01/15/2024 4:00 PM ET');
    expect(footer?.['Account']).toBeNull();
    expect(footer?.['Settlement Date']).toBeNull();
  });

  it('should keep delimiters and newlines inside quoted fields', () => {
    const description = 'Line one, part\nLine two with ""quotes""';
    const stream = new StringTextStream(csvFile([csvLine({ 'Run Date': '1/5/2024', Description: description })]));
    const [row] = Array.from(readRawRows(stream));

    expect(row?.['Description']).toBe(description);
  });

  it('should keep stray quotes inside unquoted fields', () => {
    const stream = new StringTextStream('1/5/2024,Brokerage,123,BOUGHT 5 "ABC" SHARES\n');
    const [row] = Array.from(readRawRows(stream));

    expect(row?.['Action']).toBe('BOUGHT 5 "ABC" SHARES');
  });

  it('should skip blank lines', () => {
    const stream = new StringTextStream(`\n\n${HEADER}\n\n${csvLine(BUY_ROW)}\n`);
    expect(Array.from(readRawRows(stream))).toHaveLength(2);
  });

  it('should rewind before every traversal', () => {
    const stream = new StringTextStream(csvFile([HEADER, csvLine(BUY_ROW)]));
    const first = Array.from(readRawRows(stream));
    const second = Array.from(readRawRows(stream));

    expect(second).toEqual(first);
  });

  it('should let stream errors propagate', () => {
    const stream = {
      rewind(): void {
        throw new Error('stream is not seekable');
      },
      read(): string {
        return '';
      },
    };

    expect(() => Array.from(readRawRows(stream))).toThrow('stream is not seekable');
  });
});

describe('toRawRow', () => {
  it('should map cells onto the schema in order', () => {
    const row = toRawRow(['1/5/2024', 'Brokerage']);

    expect(row['Run Date']).toBe('1/5/2024');
    expect(row['Account']).toBe('Brokerage');
    expect(row['Account Number']).toBeNull();
    expect(Object.keys(row)).toHaveLength(18);
  });
});

describe('readHeader', () => {
  it('should return the first record', () => {
    const stream = new StringTextStream(csvFile([HEADER, csvLine(BUY_ROW)]));
    expect(readHeader(stream)).toEqual([...FIDELITY_FIELDS]);
  });

  it('should drop a leading byte-order mark', () => {
    const stream = new StringTextStream(`\uFEFF${HEADER}\n`);
    expect(readHeader(stream)).toEqual([...FIDELITY_FIELDS]);
  });

  it('should return null for an empty file', () => {
    expect(readHeader(new StringTextStream(''))).toBeNull();
  });
});
