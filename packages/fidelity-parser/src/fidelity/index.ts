export { FidelityExtractor } from './extractor.js';
export { DATE_FIELD, FIDELITY_FIELDS, matchesFidelitySchema, type FidelityField } from './schema.js';
export { readRawRows, readHeader, toRawRow } from './schema-reader.js';
export {
  classifyRow,
  acceptedRows,
  countAcceptedRows,
  type AcceptedRow,
  type RowOutcome,
} from './row-filter.js';
