// ─── Extractor ──────────────────────────────────────────────────────────────
export {
  FidelityExtractor,
  DATE_FIELD,
  FIDELITY_FIELDS,
  matchesFidelitySchema,
  readRawRows,
  readHeader,
  toRawRow,
  classifyRow,
  acceptedRows,
  countAcceptedRows,
  StringTextStream,
  FileTextStream,
} from '@tradeledger/fidelity-parser';
export type { FidelityField, AcceptedRow, RowOutcome } from '@tradeledger/fidelity-parser';

// ─── Normalizers ────────────────────────────────────────────────────────────
export { beanifyAccount, parseDate, tryParseDate, parseToDecimal } from '@tradeledger/fidelity-parser';

// ─── Contracts ──────────────────────────────────────────────────────────────
export {
  FingerprintSchema,
  TransactionSchema,
  TransactionJsonSchema,
  RawRowSchema,
  createFingerprint,
  createTransaction,
  toTransactionJson,
  namedStream,
  pathLike,
} from '@tradeledger/types';
export type {
  Extractor,
  ExtractorInput,
  Fingerprint,
  FingerprintResult,
  RawRow,
  RewindableTextStream,
  Transaction,
  TransactionJson,
} from '@tradeledger/types';

// ─── Utils ──────────────────────────────────────────────────────────────────
export {
  PARSER_VERSION,
  DEFAULT_IMPORT_ID,
  renderImportId,
  ImportIdTemplateError,
  DateRangeError,
  Decimal,
} from '@tradeledger/types';

// ─── CLI helpers ────────────────────────────────────────────────────────────
export { extractFiles } from './cli/extract.js';
export type { ExtractOptions, ExtractOutput, ExtractedFile } from './cli/extract.js';
