export const PIPELINE_VERSION = '0.3.0';

export const INTERIM_FILE_PREFIX = 'formatted_';

/** A payment month at or beyond this many days past due counts as delinquent. */
export const DPD_DELINQUENCY_THRESHOLD = 30;

export const CURRENCY_SYMBOL = '₹';

export const REPORT_FILE_EXTENSION = '.xml';
export const INTERIM_FILE_EXTENSION = '.json';
