import type { PaymentRecord } from '@bureau-insights/types';

const ENTRY_SEPARATOR = '|';
const FIELD_SEPARATOR = ',';

/**
 * Splits a combined payment history such as `"01-2020,XXX/01|02-2020,091/02"`
 * into monthly records, keeping the order in which the bureau reported them.
 *
 * Blank entries are skipped. An entry that does not split into exactly
 * `date,status` is dropped and the rest of the history is still read.
 * Status codes are kept verbatim; decoding happens in the analyses.
 */
export function parsePaymentHistory(history: string | null | undefined): PaymentRecord[] {
  if (history === null || history === undefined || history === '') {
    return [];
  }

  const records: PaymentRecord[] = [];

  for (const entry of history.split(ENTRY_SEPARATOR)) {
    if (entry.trim() === '') continue;

    const fields = entry.split(FIELD_SEPARATOR);
    if (fields.length !== 2) continue;

    const [date = '', statusCode = ''] = fields;
    records.push({ date, status_code: statusCode });
  }

  return records;
}
