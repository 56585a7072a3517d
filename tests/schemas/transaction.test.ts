import { describe, it, expect } from 'vitest';
import {
  Decimal,
  TransactionJsonSchema,
  createFingerprint,
  createTransaction,
  toTransactionJson,
  type Transaction,
} from '@tradeledger/types';

const createInput = (overrides: Partial<Transaction> = {}): Transaction => ({
  extractor: 'fidelity',
  file: 'History.csv',
  lineno: 1,
  reversedLineno: -1,
  sourceAccount: 'Roth-IRA-1234',
  date: '2024-01-05',
  postDate: '2024-01-05',
  desc: 'YOU BOUGHT',
  bankDesc: 'TEST INDEX FUND',
  amount: new Decimal('-490.20'),
  currency: 'USD',
  type: 'Cash',
  lastFourDigits: '1234',
  extra: { 'Run Date': '1/5/2024', Account: null },
  ...overrides,
});

describe('createTransaction', () => {
  it('should return a frozen copy', () => {
    const txn = createTransaction(createInput());

    expect(Object.isFrozen(txn)).toBe(true);
    expect(txn.amount.equals('-490.2')).toBe(true);
    expect(txn.extra).toEqual({ 'Run Date': '1/5/2024', Account: null });
  });

  it('should reject a non-positive line number', () => {
    expect(() => createTransaction(createInput({ lineno: 0 }))).toThrow();
  });

  it('should reject dates outside YYYY-MM-DD', () => {
    expect(() => createTransaction(createInput({ date: '1/5/2024' }))).toThrow('Date must be in YYYY-MM-DD format');
  });
});

describe('createFingerprint', () => {
  it('should accept a SHA-256 hex digest', () => {
    const fingerprint = createFingerprint({ startingDate: '2024-01-05', firstRowHash: 'a'.repeat(64) });

    expect(Object.isFrozen(fingerprint)).toBe(true);
    expect(fingerprint.startingDate).toBe('2024-01-05');
  });

  it('should reject anything else', () => {
    expect(() => createFingerprint({ startingDate: '2024-01-05', firstRowHash: 'xyz' })).toThrow(
      'Must be a hex-encoded SHA-256 digest'
    );
  });
});

describe('toTransactionJson', () => {
  it('should serialize the amount as a decimal string', () => {
    const json = toTransactionJson(createTransaction(createInput()));

    expect(json.amount).toBe('-490.2');
    expect(json.lineno).toBe(1);
    expect(TransactionJsonSchema.safeParse(json).success).toBe(true);
    expect(JSON.parse(JSON.stringify(json))).toEqual(json);
  });
});
