import {
  ReportStructureError,
  type AnalysisDocument,
  type AccountSummary,
  type CreditScore,
  type Loan,
} from '@bureau-insights/types';
import {
  asSequence,
  getEntry,
  getPath,
  scalarOf,
  type NormalizedObject,
  type NormalizedValue,
} from '../tree/normalizer.js';
import { parsePaymentHistory } from './payment-history.js';

/** The only path whose absence fails a report. */
export const REPORT_CONTAINER_PATH = ['INDV-REPORTS', 'INDV-REPORT'] as const;

export const REPORT_DATE_PATH = ['HEADER', 'DATE-OF-ISSUE'] as const;

const SCORE = ['SCORES', 'SCORE'] as const;
const PRIMARY = ['ACCOUNTS-SUMMARY', 'PRIMARY-ACCOUNTS-SUMMARY'] as const;
const DERIVED = ['ACCOUNTS-SUMMARY', 'DERIVED-ATTRIBUTES'] as const;

export const CREDIT_SCORE_FIELDS = {
  value: [...SCORE, 'SCORE-VALUE'],
  type: [...SCORE, 'SCORE-TYPE'],
  comments: [...SCORE, 'SCORE-COMMENTS'],
} as const satisfies Record<keyof CreditScore, readonly string[]>;

export const SUMMARY_FIELDS = {
  total_accounts: [...PRIMARY, 'PRIMARY-NUMBER-OF-ACCOUNTS'],
  active_accounts: [...PRIMARY, 'PRIMARY-ACTIVE-NUMBER-OF-ACCOUNTS'],
  overdue_accounts: [...PRIMARY, 'PRIMARY-OVERDUE-NUMBER-OF-ACCOUNTS'],
  total_balance: [...PRIMARY, 'PRIMARY-CURRENT-BALANCE'],
  credit_history_years: [...DERIVED, 'LENGTH-OF-CREDIT-HISTORY-YEAR'],
  recent_inquiries: [...DERIVED, 'INQUIRIES-IN-LAST-SIX-MONTHS'],
} as const satisfies Record<keyof AccountSummary, readonly string[]>;

export const RESPONSES_PATH = ['RESPONSES', 'RESPONSE'] as const;

export const LOAN_DETAILS_KEY = 'LOAN-DETAILS';

/** Keys inside a response's LOAN-DETAILS element. */
export const LOAN_FIELDS = {
  account_type: 'ACCT-TYPE',
  status: 'ACCOUNT-STATUS',
  amount: 'DISBURSED-AMT',
  current_balance: 'CURRENT-BAL',
  disbursed_date: 'DISBURSED-DATE',
  closed_date: 'CLOSED-DATE',
  security_status: 'SECURITY-STATUS',
  payment_history: 'COMBINED-PAYMENT-HISTORY',
} as const satisfies Record<keyof Loan, string>;

function field(source: NormalizedValue | undefined, path: readonly string[]): string | null {
  return scalarOf(getPath(source, path));
}

function requireReportContainer(root: NormalizedValue): NormalizedObject {
  let current: NormalizedValue | undefined = root;
  const visited: string[] = [];

  for (const key of REPORT_CONTAINER_PATH) {
    visited.push(key);
    current = getEntry(current, key);
    if (current === undefined) {
      throw new ReportStructureError(visited.join('/'), `Report is missing ${visited.join('/')}`);
    }
  }

  if (current === undefined || current.kind !== 'object') {
    const found = current?.kind === 'list' ? `${current.items.length} report containers` : 'a text value';
    throw new ReportStructureError(
      REPORT_CONTAINER_PATH.join('/'),
      `Expected a single ${REPORT_CONTAINER_PATH.join('/')} element, found ${found}`
    );
  }
  return current;
}

/** Projects one RESPONSE element into a loan record. */
export function projectLoan(response: NormalizedValue): Loan {
  const details = getEntry(response, LOAN_DETAILS_KEY);
  const text = (key: string): string | null => scalarOf(getEntry(details, key));

  return {
    account_type: text(LOAN_FIELDS.account_type),
    status: text(LOAN_FIELDS.status),
    amount: text(LOAN_FIELDS.amount),
    current_balance: text(LOAN_FIELDS.current_balance),
    disbursed_date: text(LOAN_FIELDS.disbursed_date),
    closed_date: text(LOAN_FIELDS.closed_date),
    security_status: text(LOAN_FIELDS.security_status),
    payment_history: parsePaymentHistory(text(LOAN_FIELDS.payment_history)),
  };
}

/**
 * Projects a normalized bureau report into the fixed-shape analysis document.
 *
 * Every field lookup is best-effort: a missing path, or a value of the wrong
 * shape along it, yields `null`. A single RESPONSE and repeated RESPONSE
 * elements both come out as a list of loans.
 *
 * @throws ReportStructureError when INDV-REPORTS/INDV-REPORT is missing or
 *   is not a single element
 */
export function projectReport(normalized: NormalizedValue): AnalysisDocument {
  const report = requireReportContainer(normalized);

  return {
    report_date: field(report, REPORT_DATE_PATH),
    credit_score: {
      value: field(report, CREDIT_SCORE_FIELDS.value),
      type: field(report, CREDIT_SCORE_FIELDS.type),
      comments: field(report, CREDIT_SCORE_FIELDS.comments),
    },
    summary: {
      total_accounts: field(report, SUMMARY_FIELDS.total_accounts),
      active_accounts: field(report, SUMMARY_FIELDS.active_accounts),
      overdue_accounts: field(report, SUMMARY_FIELDS.overdue_accounts),
      total_balance: field(report, SUMMARY_FIELDS.total_balance),
      credit_history_years: field(report, SUMMARY_FIELDS.credit_history_years),
      recent_inquiries: field(report, SUMMARY_FIELDS.recent_inquiries),
    },
    loans: asSequence(getPath(report, RESPONSES_PATH)).map(projectLoan),
  };
}
