export {
  PARSER_VERSION,
  FIDELITY_EXTRACTOR_NAME,
  ACCOUNT_NUMBER_MASK_LENGTH,
} from './constants.js';
export {
  DateRangeError,
  toISODate,
  daysInMonth,
  parseSlashDate,
  tryParseSlashDate,
  type DateParseResult,
} from './date.js';
export { Decimal, ZERO, parseToDecimal } from './decimal.js';
export { DEFAULT_IMPORT_ID, ImportIdTemplateError, renderImportId } from './import-id.js';
