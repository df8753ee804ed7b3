import { pgEnum } from 'drizzle-orm/pg-core';

// --- Audit log ---
export const auditStatusEnum = pgEnum('audit_status', [
  'STARTED',
  'INFO',
  'COMPLETED',
  'FAILED',
]);

// --- Data quality ---
export const qualityIssueTypeEnum = pgEnum('quality_issue_type', [
  'NEGATIVE_PRICE',
  'INVALID_EMAIL',
  'MISSING_ARRANGEMENT',
  'MISSING_CUSTOMER',
  'NEGATIVE_NET_AMOUNT',
  'FUTURE_ORDER_DATE',
]);
