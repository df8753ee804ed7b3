import type {
  AuditLogEntry,
  IntermediateTableName,
  IntermediateTables,
  MartTableName,
  MartTables,
  ProcessingStat,
  QualityIssue,
  RawTableName,
  RawTables,
  Stamped,
  StagingTableName,
  StagingTables,
} from '@petalbrew/shared';

/** Read-only access to one raw relation. */
export interface RawSource<T> {
  read(): Promise<T[]>;
}

export interface UpsertResult {
  inserted: number;
  updated: number;
}

/**
 * A staging or intermediate relation keyed by natural id.
 * `upsert` is one transactional statement: matched keys are overwritten
 * (createdAt kept), new keys are inserted.
 */
export interface ModelStore<T> {
  read(): Promise<Stamped<T>[]>;
  upsert(rows: readonly T[], now: Date): Promise<UpsertResult>;
  count(): Promise<number>;
}

/** A mart relation, replaced in full on every run. */
export interface MartStore<T> {
  read(): Promise<T[]>;
  replace(rows: readonly T[]): Promise<void>;
}

export interface AuditSink {
  record(entry: AuditLogEntry): Promise<void>;
  recordIssues(issues: readonly QualityIssue[]): Promise<void>;
  recordStats(stats: readonly ProcessingStat[]): Promise<void>;
}

export type RawSources = { [T in RawTableName]: RawSource<RawTables[T]> };
export type StagingStores = { [T in StagingTableName]: ModelStore<StagingTables[T]> };
export type IntermediateStores = { [T in IntermediateTableName]: ModelStore<IntermediateTables[T]> };
export type MartStores = { [T in MartTableName]: MartStore<MartTables[T]> };

/** Everything one ETL run reads from and writes to. */
export interface Warehouse {
  raw: RawSources;
  staging: StagingStores;
  intermediate: IntermediateStores;
  marts: MartStores;
  audit: AuditSink;
  /** Idempotent DDL; run once by the entry points before the first run. */
  ensureSchema(): Promise<void>;
  close(): Promise<void>;
}
