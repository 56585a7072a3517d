export const DATE_FIELD = 'Run Date';

/** Column layout of a Fidelity account-activity export, in file order. */
export const FIDELITY_FIELDS = [
  DATE_FIELD,
  'Account',
  'Account Number',
  'Action',
  'Symbol',
  'Description',
  'Type',
  'Exchange Quantity',
  'Exchange Currency',
  'Currency',
  'Price',
  'Quantity',
  'Exchange Rate',
  'Commission',
  'Fees',
  'Accrued Interest',
  'Amount',
  'Settlement Date',
] as const;

export type FidelityField = (typeof FIDELITY_FIELDS)[number];

export function matchesFidelitySchema(fieldnames: readonly string[] | null): boolean {
  if (fieldnames === null || fieldnames.length !== FIDELITY_FIELDS.length) {
    return false;
  }
  return FIDELITY_FIELDS.every((field, i) => fieldnames[i] === field);
}
