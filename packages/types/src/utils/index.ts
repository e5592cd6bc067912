export {
  PIPELINE_VERSION,
  INTERIM_FILE_PREFIX,
  DPD_DELINQUENCY_THRESHOLD,
  CURRENCY_SYMBOL,
  REPORT_FILE_EXTENSION,
  INTERIM_FILE_EXTENSION,
} from './constants.js';
export { parseAmount, roundToTwoDecimals, formatCurrency, sumAmounts } from './money.js';
