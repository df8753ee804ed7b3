/**
 * Data Quality Checks
 *
 * Each check counts offending rows in one relation. A non-zero count becomes
 * a single QualityIssue; a zero count records nothing. Checks are advisory:
 * they never reject rows or stop a run.
 */

import {
  EMAIL_PATTERN,
  ISSUE_TYPES,
  type IssueType,
  type JoinedCoffeeOrder,
  type JoinedFlowerOrder,
  type QualityIssue,
} from '@petalbrew/shared';

export interface RowCheck<Row> {
  issueType: IssueType;
  /** Relation name written to `data_quality_issues.table_name`. */
  tableName: string;
  matches(row: Row): boolean;
}

export function isValidEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

export function countMatches<Row>(rows: readonly Row[], check: RowCheck<Row>): number {
  let count = 0;
  for (const row of rows) {
    if (check.matches(row)) count++;
  }
  return count;
}

/** Run checks in order, returning one issue per check that found rows. */
export function runChecks<Row>(
  rows: readonly Row[],
  checks: readonly RowCheck<Row>[],
  detectedAt: Date,
): QualityIssue[] {
  const issues: QualityIssue[] = [];

  for (const check of checks) {
    const issueCount = countMatches(rows, check);
    if (issueCount > 0) {
      issues.push({ tableName: check.tableName, issueType: check.issueType, issueCount, detectedAt });
    }
  }

  return issues;
}

// ── Post-join validations ────────────────────────────────────────────────────

const FLOWER_JOINED = 'int_flower_shop__orders_joined';

/** Orders whose arrangement id matched nothing in staging. */
export const missingArrangementCheck: RowCheck<JoinedFlowerOrder> = {
  issueType: ISSUE_TYPES.MISSING_ARRANGEMENT,
  tableName: FLOWER_JOINED,
  matches: (row) => row.arrangementName === null,
};

export const negativeNetAmountCheck: RowCheck<JoinedFlowerOrder> = {
  issueType: ISSUE_TYPES.NEGATIVE_NET_AMOUNT,
  tableName: FLOWER_JOINED,
  matches: (row) => row.netProductAmount < 0,
};

/** @param today - the run's current date, YYYY-MM-DD */
export function futureOrderDateCheck(today: string): RowCheck<JoinedFlowerOrder> {
  return {
    issueType: ISSUE_TYPES.FUTURE_ORDER_DATE,
    tableName: FLOWER_JOINED,
    matches: (row) => row.orderDate !== null && row.orderDate > today,
  };
}

export function flowerOrderChecks(today: string): RowCheck<JoinedFlowerOrder>[] {
  return [missingArrangementCheck, negativeNetAmountCheck, futureOrderDateCheck(today)];
}

export const missingCustomerCheck: RowCheck<JoinedCoffeeOrder> = {
  issueType: ISSUE_TYPES.MISSING_CUSTOMER,
  tableName: 'int_jaffle__orders_joined',
  matches: (row) => row.customerName === null,
};

export function coffeeOrderChecks(): RowCheck<JoinedCoffeeOrder>[] {
  return [missingCustomerCheck];
}
