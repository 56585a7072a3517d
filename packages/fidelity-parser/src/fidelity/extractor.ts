import { createHash } from 'crypto';
import { basename } from 'path';
import {
  createFingerprint,
  createTransaction,
  DEFAULT_IMPORT_ID,
  FIDELITY_EXTRACTOR_NAME,
  ACCOUNT_NUMBER_MASK_LENGTH,
} from '@tradeledger/types';
import type {
  ClosableTextStream,
  Extractor,
  ExtractorInput,
  FingerprintResult,
  RawRow,
  RewindableTextStream,
  Transaction,
} from '@tradeledger/types';
import { FileTextStream } from '../io/text-stream.js';
import { beanifyAccount, parseToDecimal } from '../normalizers/index.js';
import { acceptedRows, countAcceptedRows } from './row-filter.js';
import { FIDELITY_FIELDS, matchesFidelitySchema } from './schema.js';
import { readHeader } from './schema-reader.js';

/**
 * Extractor for Fidelity account-activity CSV exports.
 *
 * Every call re-reads the stream from the start. The accepted-row count is
 * taken once at construction and anchors `reversedLineno`, so rows appended
 * to the file later keep the IDs of the rows before them.
 */
export class FidelityExtractor implements Extractor {
  readonly name = FIDELITY_EXTRACTOR_NAME;
  readonly defaultImportId = DEFAULT_IMPORT_ID;
  readonly filename: string;
  readonly rowCount: number;

  private readonly stream: RewindableTextStream;
  private readonly ownedStream: ClosableTextStream | null;

  constructor(input: ExtractorInput) {
    if (input.kind === 'named-stream') {
      this.stream = input.stream;
      this.ownedStream = null;
      this.filename = input.label;
    } else {
      const fileStream = new FileTextStream(input.path);
      this.stream = fileStream;
      this.ownedStream = fileStream;
      this.filename = basename(input.path) || input.path;
    }

    this.rowCount = this.countRows();
  }

  detect(): boolean {
    return matchesFidelitySchema(readHeader(this.stream));
  }

  fingerprint(): FingerprintResult {
    const first = acceptedRows(this.stream).next();
    if (first.done === true) {
      return { found: false };
    }

    const { row, runDate } = first.value;
    const hash = createHash('sha256');
    for (const field of FIDELITY_FIELDS) {
      hash.update(row[field] ?? '', 'utf8');
    }

    return {
      found: true,
      fingerprint: createFingerprint({
        startingDate: runDate,
        firstRowHash: hash.digest('hex'),
      }),
    };
  }

  *extract(): Generator<Readonly<Transaction>, void, undefined> {
    let index = 0;
    for (const { row, runDate } of acceptedRows(this.stream)) {
      yield this.toTransaction(row, runDate, index);
      index++;
    }
  }

  /** Close the file this extractor opened itself. Caller-owned streams are left alone. */
  close(): void {
    this.ownedStream?.close();
  }

  private countRows(): number {
    try {
      return countAcceptedRows(this.stream);
    } catch (error) {
      this.close();
      throw error;
    }
  }

  private toTransaction(row: RawRow, runDate: string, index: number): Readonly<Transaction> {
    const field = (name: string): string => row[name] ?? '';

    return createTransaction({
      extractor: this.name,
      file: this.filename,
      lineno: index + 1,
      reversedLineno: index - this.rowCount,
      sourceAccount: beanifyAccount(field('Account')),
      // Fidelity exports carry a single run date; it is both the
      // transaction date and the posting date.
      date: runDate,
      postDate: runDate,
      desc: field('Action'),
      bankDesc: field('Description'),
      amount: parseToDecimal(field('Amount')),
      currency: field('Currency'),
      type: field('Type'),
      lastFourDigits: field('Account Number').slice(-ACCOUNT_NUMBER_MASK_LENGTH),
      extra: row,
    });
  }
}
