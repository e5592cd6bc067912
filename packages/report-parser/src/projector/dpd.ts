import { MalformedStatusCodeError } from '@bureau-insights/types';

/**
 * Asset-classification codes reported in place of a day count.
 * Built once; never mutated.
 */
export const DPD_CODE_TABLE: ReadonlyMap<string, number> = new Map([
  ['XXX', 0],
  ['STD', 0],
  ['SUB', 91],
  ['DBT', 151],
  ['LSS', 181],
  ['SMA', 61],
  ['DDD', 0],
]);

const DAY_COUNT_PATTERN = /^\d+$/;

/**
 * Decodes a payment status of the form `<dpd>/<code>` into days past due.
 * The dpd part is a zero-padded day count (`"045"`) or a symbolic code (`"SUB"`).
 *
 * @throws MalformedStatusCodeError when the status has no single `/` separator
 *   or the dpd part is neither a known code nor a day count
 */
export function decodeDpd(status: string): number {
  const parts = status.split('/');
  if (parts.length !== 2) {
    throw new MalformedStatusCodeError(status, 'expected "<dpd>/<code>"');
  }

  const [dpdField = ''] = parts;

  const mapped = DPD_CODE_TABLE.get(dpdField);
  if (mapped !== undefined) {
    return mapped;
  }

  if (!DAY_COUNT_PATTERN.test(dpdField)) {
    throw new MalformedStatusCodeError(status, `unknown days-past-due value "${dpdField}"`);
  }
  return parseInt(dpdField, 10);
}

/** Non-throwing variant for callers that only need to know whether a status decodes. */
export function tryDecodeDpd(status: string): { ok: true; dpd: number } | { ok: false; error: MalformedStatusCodeError } {
  try {
    return { ok: true, dpd: decodeDpd(status) };
  } catch (error) {
    if (error instanceof MalformedStatusCodeError) {
      return { ok: false, error };
    }
    throw error;
  }
}
