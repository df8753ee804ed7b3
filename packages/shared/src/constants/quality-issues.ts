/**
 * Data quality issue types.
 * Each maps to one row in `data_quality_issues` per run when the
 * offending-row count is non-zero. Findings never stop a run.
 */
export const ISSUE_TYPES = {
  NEGATIVE_PRICE: 'NEGATIVE_PRICE',
  INVALID_EMAIL: 'INVALID_EMAIL',
  MISSING_ARRANGEMENT: 'MISSING_ARRANGEMENT',
  MISSING_CUSTOMER: 'MISSING_CUSTOMER',
  NEGATIVE_NET_AMOUNT: 'NEGATIVE_NET_AMOUNT',
  FUTURE_ORDER_DATE: 'FUTURE_ORDER_DATE',
} as const;

export type IssueType = (typeof ISSUE_TYPES)[keyof typeof ISSUE_TYPES];

/** Customer email format accepted by the INVALID_EMAIL check. */
export const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;
