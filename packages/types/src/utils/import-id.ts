/**
 * Import ID rendering
 *
 * Import IDs identify a transaction across repeated imports of the same
 * export file. Templates use `{{ variable }}` placeholders with an optional
 * `| filter`, e.g. `{{ file | as_posix_path }}:{{ reversed_lineno }}`.
 */

import type { Transaction } from '../schemas/index.js';

export const DEFAULT_IMPORT_ID = '{{ file | as_posix_path }}:{{ reversed_lineno }}';

export class ImportIdTemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImportIdTemplateError';
  }
}

type TemplateVariable =
  | 'extractor'
  | 'file'
  | 'lineno'
  | 'reversed_lineno'
  | 'source_account'
  | 'date'
  | 'post_date'
  | 'desc'
  | 'bank_desc'
  | 'amount'
  | 'currency'
  | 'type'
  | 'last_four_digits';

const VARIABLES: Record<TemplateVariable, (txn: Transaction) => string> = {
  extractor: (txn) => txn.extractor,
  file: (txn) => txn.file,
  lineno: (txn) => String(txn.lineno),
  reversed_lineno: (txn) => String(txn.reversedLineno),
  source_account: (txn) => txn.sourceAccount,
  date: (txn) => txn.date,
  post_date: (txn) => txn.postDate,
  desc: (txn) => txn.desc,
  bank_desc: (txn) => txn.bankDesc,
  amount: (txn) => txn.amount.toString(),
  currency: (txn) => txn.currency,
  type: (txn) => txn.type,
  last_four_digits: (txn) => txn.lastFourDigits,
};

const FILTERS: Record<string, (value: string) => string> = {
  as_posix_path: (value) => value.replace(/\\/g, '/'),
};

const PLACEHOLDER = /\{\{\s*([^}]*?)\s*\}\}/g;

function isTemplateVariable(name: string): name is TemplateVariable {
  return Object.prototype.hasOwnProperty.call(VARIABLES, name);
}

export function renderImportId(template: string, transaction: Transaction): string {
  return template.replace(PLACEHOLDER, (_match, expression: string) => {
    const [name = '', ...filters] = expression.split('|').map((part) => part.trim());
    if (!isTemplateVariable(name)) {
      throw new ImportIdTemplateError(`Unknown import ID variable: ${name}`);
    }
    let value = VARIABLES[name](transaction);
    for (const filterName of filters) {
      const filter = FILTERS[filterName];
      if (filter === undefined) {
        throw new ImportIdTemplateError(`Unknown import ID filter: ${filterName}`);
      }
      value = filter(value);
    }
    return value;
  });
}
