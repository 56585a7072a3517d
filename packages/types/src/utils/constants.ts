export const PARSER_VERSION = '0.3.0';

export const FIDELITY_EXTRACTOR_NAME = 'fidelity';

export const ACCOUNT_NUMBER_MASK_LENGTH = 4;
