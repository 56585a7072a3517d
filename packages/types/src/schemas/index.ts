export {
  RawRowSchema,
  FingerprintSchema,
  TransactionSchema,
  TransactionJsonSchema,
  createFingerprint,
  createTransaction,
  toTransactionJson,
} from './transaction.js';

export type {
  RawRow,
  Fingerprint,
  FingerprintResult,
  Transaction,
  TransactionJson,
} from './transaction.js';
