import type { AnalysisDocument, AnalysisName, AnalysisStatsByName, DpdDecodeFailure } from '@bureau-insights/types';
import { analyzeDpdIncidence } from './dpd-incidence.js';
import { analyzeMaxDpdMonths } from './max-dpd-months.js';
import { analyzeDisbursements } from './disbursements.js';

export interface AnalysisDefinition<N extends AnalysisName> {
  name: N;
  description: string;
  analyze: (doc: AnalysisDocument) => AnalysisStatsByName[N];
  /** Non-fatal problems worth logging for one customer's statistics. */
  warnings: (stats: AnalysisStatsByName[N]) => string[];
}

export function describeDecodeFailure(failure: DpdDecodeFailure): string {
  return `loan ${failure.loanIndex + 1}, ${failure.date}: ${failure.message}`;
}

export type AnalysisRegistry = { readonly [N in AnalysisName]: AnalysisDefinition<N> };

export const ANALYSES: AnalysisRegistry = {
  dpd: {
    name: 'dpd',
    description: 'Trades with any 30+ DPD month',
    analyze: analyzeDpdIncidence,
    warnings: (stats) => stats.decodeErrors.map(describeDecodeFailure),
  },
  max_dpd_months: {
    name: 'max_dpd_months',
    description: 'Maximum number of 30+ DPD months on a single trade',
    analyze: analyzeMaxDpdMonths,
    warnings: (stats) => stats.decodeErrors.map(describeDecodeFailure),
  },
  disbursements: {
    name: 'disbursements',
    description: 'Total disbursed amount per customer',
    analyze: analyzeDisbursements,
    warnings: () => [],
  },
};

/** Run order for a full pipeline pass. */
export const ANALYSIS_NAMES: readonly AnalysisName[] = ['dpd', 'max_dpd_months', 'disbursements'];

export function isAnalysisName(value: string): value is AnalysisName {
  return ANALYSIS_NAMES.some((name) => name === value);
}
