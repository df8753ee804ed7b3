/**
 * Staging steps, in execution order. Each step reads one raw relation,
 * filters and normalizes it, records its quality findings and hands back a
 * prepared batch. Nothing is written to staging until every step has run.
 */

import {
  arrangementsModel,
  coffeeOrdersModel,
  customersModel,
  dedupeByKey,
  deliveryModel,
  flowerOrdersModel,
  flowersModel,
  itemsModel,
  productsModel,
  runChecks,
  stageRecords,
  storesModel,
  suppliesModel,
  type StagingModel,
} from '@petalbrew/business-rules';
import type { QualityIssue, RawTableName, StagingTableName } from '@petalbrew/shared';
import type { Logger } from '../utils/logger';
import type { AuditSink, UpsertResult, Warehouse } from '../warehouse/types';
import { ValidationFailure } from './errors';

export interface StepContext {
  warehouse: Warehouse;
  clock: () => Date;
  log: Logger;
}

/** A validated staging batch waiting to be merged. */
export interface PreparedBatch {
  label: string;
  target: StagingTableName;
  size: number;
  commit(now: Date): Promise<UpsertResult>;
}

export type StagingStep = (ctx: StepContext) => Promise<PreparedBatch>;

/** Append findings to the issue log and warn about each. */
export async function recordIssues(
  sink: AuditSink,
  issues: readonly QualityIssue[],
  log: Logger,
): Promise<void> {
  if (issues.length === 0) return;
  for (const issue of issues) {
    log.warn(
      { table: issue.tableName, issueType: issue.issueType, count: issue.issueCount },
      'Data quality issue detected',
    );
  }
  await sink.recordIssues(issues);
}

export function stagingStep<R extends RawTableName, S extends StagingTableName>(
  model: StagingModel<R, S>,
): StagingStep {
  return async ({ warehouse, clock, log }) => {
    const raw = await warehouse.raw[model.source].read();
    const rows = dedupeByKey(stageRecords(model, raw), model.keyOf);

    log.info(
      { table: model.target, source: model.source, count: rows.length, rejected: raw.length - rows.length },
      'Staged batch prepared',
    );

    if (model.mandatory && rows.length === 0) {
      throw new ValidationFailure(`No valid ${model.label} records found in ${model.source} table`);
    }

    const detectedAt = clock();
    await recordIssues(
      warehouse.audit,
      [
        ...runChecks(raw, model.rawChecks ?? [], detectedAt),
        ...runChecks(rows, model.stagedChecks ?? [], detectedAt),
      ],
      log,
    );

    const store = warehouse.staging[model.target];
    return {
      label: model.label,
      target: model.target,
      size: rows.length,
      commit: (now) => store.upsert(rows, now),
    };
  };
}

export const STAGING_STEPS: readonly StagingStep[] = [
  stagingStep(flowersModel),
  stagingStep(arrangementsModel),
  stagingStep(flowerOrdersModel),
  stagingStep(deliveryModel),
  stagingStep(suppliesModel),
  stagingStep(customersModel),
  stagingStep(storesModel),
  stagingStep(productsModel),
  stagingStep(coffeeOrdersModel),
  stagingStep(itemsModel),
];
