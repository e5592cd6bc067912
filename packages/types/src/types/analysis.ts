/**
 * Statistics records produced by the per-customer analyses.
 * Each analysis receives one AnalysisDocument and returns one of these.
 */

export interface DpdMonth {
  date: string;
  dpd: number;
}

/** A payment entry whose status code could not be decoded; the entry is skipped. */
export interface DpdDecodeFailure {
  loanIndex: number;
  date: string;
  statusCode: string;
  message: string;
}

export interface DpdIncidenceLoanDetail {
  type: string | null;
  status: string | null;
  dpdMonths: DpdMonth[];
  has30PlusDpd: boolean;
}

export interface DpdIncidenceStats {
  totalTrades: number;
  tradesWith30PlusDpd: number;
  /** Share of trades with any 30+ DPD month, as a percentage rounded to 2 decimals. */
  percentage: number;
  loanDetails: DpdIncidenceLoanDetail[];
  decodeErrors: DpdDecodeFailure[];
}

export interface MaxDpdLoanDetail {
  type: string | null;
  disbursedDate: string | null;
  dpdCount: number;
  dpdMonths: DpdMonth[];
}

export interface MaxDpdMonthsStats {
  maxDpdMonths: number;
  loanDetails: MaxDpdLoanDetail[];
  decodeErrors: DpdDecodeFailure[];
}

export interface DisbursementLoanDetail {
  type: string | null;
  amount: number;
  date: string | null;
  status: string | null;
}

export interface DisbursementStats {
  totalDisbursed: number;
  loanCount: number;
  loanDetails: DisbursementLoanDetail[];
}

export interface CustomerResult<TStats> {
  customerId: string;
  stats: TStats;
}

export type AnalysisName = 'dpd' | 'max_dpd_months' | 'disbursements';

export interface AnalysisStatsByName {
  dpd: DpdIncidenceStats;
  max_dpd_months: MaxDpdMonthsStats;
  disbursements: DisbursementStats;
}
