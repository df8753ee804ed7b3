import {
  pgTable, serial, text, integer, timestamp, date, index,
} from 'drizzle-orm/pg-core';
import { auditStatusEnum, qualityIssueTypeEnum } from './enums';

// =============================================================================
// ETL Audit Log (one STARTED, INFO*, then COMPLETED or FAILED per run)
// =============================================================================

export const etlAuditLog = pgTable(
  'etl_audit_log',
  {
    id: serial('id').primaryKey(),
    procedureName: text('procedure_name').notNull(),
    startTime: timestamp('start_time', { withTimezone: true }).notNull(),
    endTime: timestamp('end_time', { withTimezone: true }),
    status: auditStatusEnum('status').notNull(),
    message: text('message').notNull(),
  },
  (table) => [
    index('idx_etl_audit_log_procedure').on(table.procedureName),
    index('idx_etl_audit_log_start_time').on(table.startTime),
  ],
);

// =============================================================================
// Data Quality Issues (advisory, append-only)
// =============================================================================

export const dataQualityIssues = pgTable(
  'data_quality_issues',
  {
    id: serial('id').primaryKey(),
    tableName: text('table_name').notNull(),
    issueType: qualityIssueTypeEnum('issue_type').notNull(),
    issueCount: integer('issue_count').notNull(),
    detectedAt: timestamp('detected_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    index('idx_data_quality_issues_type').on(table.issueType),
    index('idx_data_quality_issues_detected_at').on(table.detectedAt),
  ],
);

// =============================================================================
// Processing Stats (one row per model table per successful run)
// =============================================================================

export const processingStats = pgTable(
  'processing_stats',
  {
    id: serial('id').primaryKey(),
    tableName: text('table_name').notNull(),
    recordCount: integer('record_count').notNull(),
    processingDate: date('processing_date', { mode: 'string' }).notNull(),
  },
  (table) => [index('idx_processing_stats_date').on(table.processingDate)],
);
