import type { AnalysisDocument, Loan } from '@bureau-insights/types';

export interface LoanFields {
  type?: string;
  status?: string;
  amount?: string;
  balance?: string;
  disbursed?: string;
  closed?: string;
  security?: string;
  history?: string;
}

function element(tag: string, value: string | undefined): string {
  return value === undefined ? '' : `<${tag}>${value}</${tag}>`;
}

export function responseXml(fields: LoanFields): string {
  return [
    '<RESPONSE><LOAN-DETAILS>',
    element('ACCT-TYPE', fields.type),
    element('ACCOUNT-STATUS', fields.status),
    element('DISBURSED-AMT', fields.amount),
    element('CURRENT-BAL', fields.balance),
    element('DISBURSED-DATE', fields.disbursed),
    element('CLOSED-DATE', fields.closed),
    element('SECURITY-STATUS', fields.security),
    element('COMBINED-PAYMENT-HISTORY', fields.history),
    '</LOAN-DETAILS></RESPONSE>',
  ].join('');
}

export const PERSONAL_LOAN: LoanFields = {
  type: 'Personal Loan',
  status: 'Active',
  amount: '1,50,000',
  balance: '75,000',
  disbursed: '10-01-2020',
  security: 'Unsecured',
  history: '01-2020,000/STD|02-2020,045/SMA|03-2020,SUB/SUB|',
};

export const GOLD_LOAN: LoanFields = {
  type: 'Gold Loan',
  status: 'Closed',
  amount: '50,000',
  balance: '0',
  disbursed: '05-06-2021',
  closed: '05-12-2021',
  security: 'Secured',
  history: '06-2021,000/STD|07-2021,XXX/XXX',
};

/** A complete bureau report wrapping the given RESPONSE elements. */
export function reportXml(responses: string[] = [responseXml(PERSONAL_LOAN), responseXml(GOLD_LOAN)]): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<INDV-REPORT-FILE>
  <INDV-REPORTS>
    <INDV-REPORT>
      <HEADER>
        <DATE-OF-ISSUE>15-03-2024</DATE-OF-ISSUE>
      </HEADER>
      <SCORES>
        <SCORE>
          <SCORE-TYPE>PERFORM CONSUMER 2.0</SCORE-TYPE>
          <SCORE-VALUE>742</SCORE-VALUE>
          <SCORE-COMMENTS>Good</SCORE-COMMENTS>
        </SCORE>
      </SCORES>
      <ACCOUNTS-SUMMARY>
        <PRIMARY-ACCOUNTS-SUMMARY>
          <PRIMARY-NUMBER-OF-ACCOUNTS>3</PRIMARY-NUMBER-OF-ACCOUNTS>
          <PRIMARY-ACTIVE-NUMBER-OF-ACCOUNTS>2</PRIMARY-ACTIVE-NUMBER-OF-ACCOUNTS>
          <PRIMARY-OVERDUE-NUMBER-OF-ACCOUNTS>1</PRIMARY-OVERDUE-NUMBER-OF-ACCOUNTS>
          <PRIMARY-CURRENT-BALANCE>1,25,000</PRIMARY-CURRENT-BALANCE>
        </PRIMARY-ACCOUNTS-SUMMARY>
        <DERIVED-ATTRIBUTES>
          <LENGTH-OF-CREDIT-HISTORY-YEAR>6</LENGTH-OF-CREDIT-HISTORY-YEAR>
          <INQUIRIES-IN-LAST-SIX-MONTHS>2</INQUIRIES-IN-LAST-SIX-MONTHS>
        </DERIVED-ATTRIBUTES>
      </ACCOUNTS-SUMMARY>
      <RESPONSES>
        ${responses.join('\n        ')}
      </RESPONSES>
    </INDV-REPORT>
  </INDV-REPORTS>
</INDV-REPORT-FILE>
`;
}

export function createLoan(overrides: Partial<Loan> = {}): Loan {
  return {
    account_type: 'Personal Loan',
    status: 'Active',
    amount: '1,00,000',
    current_balance: '40,000',
    disbursed_date: '01-01-2022',
    closed_date: null,
    security_status: 'Unsecured',
    payment_history: [],
    ...overrides,
  };
}

export function createDocument(loans: Loan[] = []): AnalysisDocument {
  return {
    report_date: '15-03-2024',
    credit_score: { value: '742', type: 'PERFORM CONSUMER 2.0', comments: 'Good' },
    summary: {
      total_accounts: '3',
      active_accounts: '2',
      overdue_accounts: '1',
      total_balance: '1,25,000',
      credit_history_years: '6',
      recent_inquiries: '2',
    },
    loans,
  };
}
