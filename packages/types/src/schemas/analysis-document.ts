import { z } from 'zod';

/** Bureau fields are carried verbatim; an absent field is `null`, never omitted. */
const OptionalText = z.string().nullable();

export const PaymentRecordSchema = z.object({
  date: z.string(),
  status_code: z.string(),
});
export type PaymentRecord = z.infer<typeof PaymentRecordSchema>;

export const LoanSchema = z.object({
  account_type: OptionalText,
  status: OptionalText,
  amount: OptionalText,
  current_balance: OptionalText,
  disbursed_date: OptionalText,
  closed_date: OptionalText,
  security_status: OptionalText,
  payment_history: z.array(PaymentRecordSchema),
});
export type Loan = z.infer<typeof LoanSchema>;

export const CreditScoreSchema = z.object({
  value: OptionalText,
  type: OptionalText,
  comments: OptionalText,
});
export type CreditScore = z.infer<typeof CreditScoreSchema>;

export const AccountSummarySchema = z.object({
  total_accounts: OptionalText,
  active_accounts: OptionalText,
  overdue_accounts: OptionalText,
  total_balance: OptionalText,
  credit_history_years: OptionalText,
  recent_inquiries: OptionalText,
});
export type AccountSummary = z.infer<typeof AccountSummarySchema>;

export const AnalysisDocumentSchema = z.object({
  report_date: OptionalText,
  credit_score: CreditScoreSchema,
  summary: AccountSummarySchema,
  loans: z.array(LoanSchema),
});
export type AnalysisDocument = z.infer<typeof AnalysisDocumentSchema>;
