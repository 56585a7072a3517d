import type { FingerprintResult, Transaction } from '../schemas/index.js';

/** Contract every export-format extractor fulfils for the import pipeline. */
export interface Extractor {
  readonly name: string;
  readonly defaultImportId: string;
  detect(): boolean;
  fingerprint(): FingerprintResult;
  extract(): Generator<Readonly<Transaction>, void, undefined>;
}
