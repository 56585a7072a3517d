// Extractor and pipeline stages
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
} from './fidelity/index.js';

export type { FidelityField, AcceptedRow, RowOutcome } from './fidelity/index.js';

// Normalizers
export { beanifyAccount, parseDate, tryParseDate, parseToDecimal } from './normalizers/index.js';

// Streams
export { StringTextStream, FileTextStream } from './io/index.js';
