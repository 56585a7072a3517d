import { z } from 'zod';
import { Decimal } from 'decimal.js';

const ISODateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

export const RawRowSchema = z.record(z.string(), z.string().nullable());
export type RawRow = z.infer<typeof RawRowSchema>;

export const FingerprintSchema = z.object({
  startingDate: ISODateSchema,
  firstRowHash: z.string().regex(/^[a-f0-9]{64}$/, 'Must be a hex-encoded SHA-256 digest'),
});
export type Fingerprint = z.infer<typeof FingerprintSchema>;

export const TransactionSchema = z.object({
  extractor: z.string().min(1),
  file: z.string(),
  lineno: z.number().int().positive(),
  reversedLineno: z.number().int(),
  sourceAccount: z.string(),
  date: ISODateSchema,
  postDate: ISODateSchema,
  desc: z.string(),
  bankDesc: z.string(),
  amount: z.instanceof(Decimal),
  currency: z.string(),
  type: z.string(),
  lastFourDigits: z.string().max(4),
  extra: RawRowSchema,
});
export type Transaction = z.infer<typeof TransactionSchema>;

/** JSON-safe transaction shape: the amount travels as its decimal string. */
export const TransactionJsonSchema = TransactionSchema.extend({
  amount: z.string(),
});
export type TransactionJson = z.infer<typeof TransactionJsonSchema>;

/**
 * Outcome of fingerprinting a file. A file with no accepted rows has
 * nothing to fingerprint, which is not an error.
 */
export type FingerprintResult =
  | { found: true; fingerprint: Fingerprint }
  | { found: false };

export function createFingerprint(input: Fingerprint): Readonly<Fingerprint> {
  return Object.freeze(FingerprintSchema.parse(input));
}

export function createTransaction(input: Transaction): Readonly<Transaction> {
  const parsed = TransactionSchema.parse(input);
  return Object.freeze({ ...parsed, extra: Object.freeze(parsed.extra) });
}

export function toTransactionJson(transaction: Transaction): TransactionJson {
  return {
    ...transaction,
    extra: { ...transaction.extra },
    amount: transaction.amount.toString(),
  };
}
